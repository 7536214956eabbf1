/**
 * Eligibility Filter
 *
 * An offering passes when all of these hold:
 * - student cutoff >= offering cutoff for the student's category
 * - annual fee <= budget × (1 + budgetTolerance)
 * - branch is one of the preferred branches (skipped when none are given)
 * - a hostel is available, if the student needs one
 */

import type { Offering, StudentProfile } from '../types';
import type { EngineOptions } from './config';

export type EligibilityOptions = Pick<EngineOptions, 'budgetTolerance'>;

export function normaliseBranch(branch: string): string {
  return branch.trim().toUpperCase();
}

export function budgetCeiling(budget: number, budgetTolerance: number): number {
  return budget * (1 + budgetTolerance);
}

export function eligibilityMargin(profile: StudentProfile, offering: Offering): number {
  return profile.cutoff - offering.cutoffs[profile.category];
}

function branchMatcher(preferredBranches: string[]): (branch: string) => boolean {
  if (preferredBranches.length === 0) {
    return () => true;
  }
  const preferred = new Set(preferredBranches.map(normaliseBranch));
  return (branch) => preferred.has(normaliseBranch(branch));
}

export function isEligible(
  profile: StudentProfile,
  offering: Offering,
  options: EligibilityOptions
): boolean {
  return (
    eligibilityMargin(profile, offering) >= 0 &&
    offering.annualFee <= budgetCeiling(profile.budget, options.budgetTolerance) &&
    branchMatcher(profile.preferredBranches)(offering.branch) &&
    (!profile.needHostel || offering.hostelAvailable)
  );
}

/**
 * Returns the eligible offerings in table order
 */
export function filterEligible(
  profile: StudentProfile,
  offerings: readonly Offering[],
  options: EligibilityOptions
): Offering[] {
  return offerings.filter((offering) => isEligible(profile, offering, options));
}
