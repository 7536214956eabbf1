/**
 * Recommendation pipeline
 *
 * validate → resolve names → filter → score → rank → explain
 */

import {
  CATEGORIES,
  type OptionsResponse,
  type RecommendationItem,
  type ScoreBreakdown,
  type ScoredRecommendation,
  type StudentProfile,
  type Weights,
} from '../types';
import { DEFAULT_ENGINE_OPTIONS, type EngineOptions } from './config';
import { distanceBetweenDistricts, type DataTable, type DistrictCoordinates } from './data';
import { filterEligible } from './eligibility';
import { ValidationError } from './errors';
import { createLogger } from './logger';
import { rankRecommendations } from './ranking';
import { scoreOfferings } from './scoring';
import { resolveBranches, resolveDistrict } from './search';
import { validateRecommendationRequest } from './validation';
import { DEFAULT_WEIGHTS, resolveWeights } from './weights';

const log = createLogger('recommend');

export interface RecommendationResult {
  profile: StudentProfile;
  weights: Weights;
  eligibleCount: number;
  recommendations: ScoredRecommendation[];
}

/**
 * Pure core: filter, score and rank a table for an already-valid profile
 */
export function recommendForProfile(
  profile: StudentProfile,
  offerings: DataTable['offerings'],
  weights: Weights,
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS,
  topK: number = options.topK
): { eligibleCount: number; recommendations: ScoredRecommendation[] } {
  const eligible = filterEligible(profile, offerings, options);
  const scored = scoreOfferings(eligible, profile, weights, options);
  return {
    eligibleCount: eligible.length,
    recommendations: rankRecommendations(scored, topK),
  };
}

/**
 * Validates a raw request body and recommends offerings from the table.
 *
 * @throws ValidationError when the body or its weights are invalid
 */
export function recommend(
  body: unknown,
  table: DataTable,
  options: EngineOptions = DEFAULT_ENGINE_OPTIONS
): RecommendationResult {
  const validation = validateRecommendationRequest(body);
  if (!validation.valid) {
    throw new ValidationError(validation.issues);
  }

  const { weights: overrides, topK = options.topK } = validation.value;
  const weights = resolveWeights(overrides);

  const { resolved, unresolved } = resolveBranches(validation.value.profile.preferredBranches, table.branches);
  const profile: StudentProfile = {
    ...validation.value.profile,
    preferredBranches: [...resolved, ...unresolved],
    district: resolveDistrict(validation.value.profile.district, table.districts),
  };

  const { eligibleCount, recommendations } = recommendForProfile(profile, table.offerings, weights, options, topK);

  log.debug('Recommendations computed', {
    category: profile.category,
    branches: profile.preferredBranches,
    eligible: eligibleCount,
    returned: recommendations.length,
  });

  return { profile, weights, eligibleCount, recommendations };
}

// ============================================================================
// WIRE FORMAT
// ============================================================================

export function roundScore(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function roundBreakdown(breakdown: ScoreBreakdown): ScoreBreakdown {
  const round = (criterion: keyof ScoreBreakdown) => ({
    score: roundScore(breakdown[criterion].score),
    weight: roundScore(breakdown[criterion].weight),
    contribution: roundScore(breakdown[criterion].contribution),
  });
  return {
    affordability: round('affordability'),
    proximity: round('proximity'),
    placements: round('placements'),
    quality: round('quality'),
    diversity: round('diversity'),
  };
}

/**
 * Converts ranked recommendations into response items, numbered from 1
 */
export function toRecommendationItems(
  recommendations: readonly ScoredRecommendation[],
  profile: StudentProfile,
  coordinates: DistrictCoordinates = new Map()
): RecommendationItem[] {
  return recommendations.map((rec, index) => {
    const { offering } = rec;
    const distance = distanceBetweenDistricts(coordinates, profile.district, offering.district);
    return {
      rank: index + 1,
      college_code: offering.collegeCode,
      college: offering.collegeName,
      branch: offering.branch,
      district: offering.district,
      ownership: offering.ownership,
      fee: offering.annualFee,
      placement_rate: offering.placementRate,
      quality_score: offering.qualityScore,
      distance_km: distance === null ? null : Math.round(distance * 10) / 10,
      eligibility_margin: roundScore(rec.eligibilityMargin, 2),
      total_score: roundScore(rec.totalScore),
      breakdown: roundBreakdown(rec.breakdown),
      explanation: {
        reasons: rec.reasons,
        notes: rec.notes,
      },
    };
  });
}

/**
 * Values a client needs to build a request form
 */
export function getOptions(table: DataTable): OptionsResponse {
  return {
    categories: [...CATEGORIES],
    branches: [...table.branches],
    districts: [...table.districts],
    default_weights: { ...DEFAULT_WEIGHTS },
  };
}
