import type { ScoredRecommendation } from '../types';

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// Weighted sums that are equal on paper can differ in the last few bits
const SCORE_EPSILON = 1e-9;

function compareScores(a: number, b: number): number {
  const diff = b - a;
  return Math.abs(diff) <= SCORE_EPSILON ? 0 : diff;
}

/**
 * Order: total score desc (within SCORE_EPSILON counts as a tie), quality score desc, college name asc, branch asc
 */
export function compareRecommendations(a: ScoredRecommendation, b: ScoredRecommendation): number {
  return (
    compareScores(a.totalScore, b.totalScore) ||
    b.offering.qualityScore - a.offering.qualityScore ||
    compareText(a.offering.collegeName, b.offering.collegeName) ||
    compareText(a.offering.branch, b.offering.branch)
  );
}

/**
 * Sort a copy of the scored list and keep the first `topK`
 */
export function rankRecommendations(
  scored: readonly ScoredRecommendation[],
  topK: number
): ScoredRecommendation[] {
  return [...scored].sort(compareRecommendations).slice(0, Math.max(0, topK));
}
