/**
 * Scoring Engine
 *
 * totalScore = Σ (subScore × weight × factor)
 *
 * subScores (all 0..1):
 * - affordability: 1 − fee / budget, floored at 0
 * - proximity: 1 in the student's district, partial credit elsewhere
 * - placements: placement rate
 * - quality: quality score
 * - diversity: 1 when a rural/first-gen student meets a supporting college
 *
 * factor is 1 within budget and budgetStretchPenalty when the fee is over the
 * budget. The breakdown always sums to the total.
 */

import {
  CRITERIA,
  type Criterion,
  type CriterionScore,
  type Offering,
  type ScoreBreakdown,
  type ScoredRecommendation,
  type StudentProfile,
  type Weights,
} from '../types';
import type { EngineOptions } from './config';
import { eligibilityMargin } from './eligibility';

export type ScoringOptions = Pick<EngineOptions, 'proximityPartialCredit' | 'budgetStretchPenalty'>;

export function affordabilityScore(fee: number, budget: number): number {
  if (budget <= 0) {
    return fee <= 0 ? 1 : 0;
  }
  return Math.max(0, 1 - fee / budget);
}

export function sameDistrict(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export function subScores(
  offering: Offering,
  profile: StudentProfile,
  options: ScoringOptions
): Record<Criterion, number> {
  return {
    affordability: affordabilityScore(offering.annualFee, profile.budget),
    proximity: sameDistrict(offering.district, profile.district) ? 1 : options.proximityPartialCredit,
    placements: offering.placementRate,
    quality: offering.qualityScore,
    diversity: profile.ruralOrFirstGen && offering.ruralSupport ? 1 : 0,
  };
}

// ============================================================================
// EXPLANATIONS
// ============================================================================

export function formatRupees(amount: number): string {
  return `₹${Math.round(amount).toLocaleString('en-IN')}`;
}

function formatMarks(marks: number): string {
  return String(Number(marks.toFixed(2)));
}

function formatPercent(rate: number): string {
  return `${Math.round(rate * 100)}%`;
}

/**
 * Human-readable reasons, in criterion order
 */
function buildReasons(offering: Offering, profile: StudentProfile, margin: number): string[] {
  const reasons: string[] = [];

  reasons.push(
    margin === 0
      ? `Your cutoff exactly meets the ${profile.category} requirement of ${formatMarks(offering.cutoffs[profile.category])}`
      : `Your cutoff clears the ${profile.category} requirement by ${formatMarks(margin)} marks`
  );

  if (offering.annualFee <= profile.budget) {
    reasons.push(`Within budget (${formatRupees(offering.annualFee)} of ${formatRupees(profile.budget)})`);
  } else {
    reasons.push(`Fee ${formatRupees(offering.annualFee)} is above your ${formatRupees(profile.budget)} budget`);
  }

  reasons.push(
    sameDistrict(offering.district, profile.district)
      ? `In your district (${offering.district})`
      : `Located in ${offering.district}`
  );

  if (offering.placementRate >= 0.85) reasons.push(`Strong placements (${formatPercent(offering.placementRate)})`);
  else if (offering.placementRate >= 0.7) reasons.push(`Good placements (${formatPercent(offering.placementRate)})`);
  else reasons.push(`Placements ${formatPercent(offering.placementRate)}`);

  if (offering.qualityScore >= 0.85) reasons.push('Highly rated for quality');

  if (profile.ruralOrFirstGen && offering.ruralSupport) {
    reasons.push('Supports rural and first-generation students');
  }

  return reasons;
}

// ============================================================================
// SCORING
// ============================================================================

/**
 * Score one eligible offering for a profile
 */
export function scoreOffering(
  offering: Offering,
  profile: StudentProfile,
  weights: Weights,
  options: ScoringOptions
): ScoredRecommendation {
  const scores = subScores(offering, profile, options);
  const withinBudget = offering.annualFee <= profile.budget;
  const factor = withinBudget ? 1 : options.budgetStretchPenalty;

  const entry = (criterion: Criterion): CriterionScore => ({
    score: scores[criterion],
    weight: weights[criterion],
    contribution: scores[criterion] * weights[criterion] * factor,
  });
  const breakdown: ScoreBreakdown = {
    affordability: entry('affordability'),
    proximity: entry('proximity'),
    placements: entry('placements'),
    quality: entry('quality'),
    diversity: entry('diversity'),
  };
  const totalScore = CRITERIA.reduce((total, criterion) => total + breakdown[criterion].contribution, 0);

  const notes: string[] = [];
  if (!withinBudget) {
    const penaltyPercent = Math.round((1 - options.budgetStretchPenalty) * 100);
    notes.push(`Budget slightly above limit: applied ${penaltyPercent}% penalty.`);
  }

  const margin = eligibilityMargin(profile, offering);

  return {
    offering,
    totalScore,
    breakdown,
    eligibilityMargin: margin,
    withinBudget,
    reasons: buildReasons(offering, profile, margin),
    notes,
  };
}

export function scoreOfferings(
  offerings: readonly Offering[],
  profile: StudentProfile,
  weights: Weights,
  options: ScoringOptions
): ScoredRecommendation[] {
  return offerings.map((offering) => scoreOffering(offering, profile, weights, options));
}
