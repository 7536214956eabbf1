import { CRITERIA, type Weights } from '../types';
import { ValidationError } from './errors';
import { createLogger } from './logger';

const log = createLogger('weights');

/**
 * Default importance of each criterion. Sums to 1.
 */
export const DEFAULT_WEIGHTS: Readonly<Weights> = Object.freeze({
  affordability: 0.3,
  proximity: 0.2,
  placements: 0.25,
  quality: 0.15,
  diversity: 0.1,
});

const SUM_TOLERANCE = 1e-9;

export function sumWeights(weights: Weights): number {
  return CRITERIA.reduce((total, criterion) => total + weights[criterion], 0);
}

/**
 * Merges overrides over the defaults and normalises the result to sum to 1.
 *
 * Negative or non-finite weights are rejected. A configuration whose weights
 * are all zero falls back to the defaults.
 */
export function resolveWeights(overrides?: Partial<Weights>): Weights {
  const merged: Weights = { ...DEFAULT_WEIGHTS };

  const issues: string[] = [];
  for (const criterion of CRITERIA) {
    const value = overrides?.[criterion] ?? DEFAULT_WEIGHTS[criterion];
    merged[criterion] = value;
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      issues.push(`Weight "${criterion}" must be a non-negative number.`);
    }
  }
  if (issues.length > 0) {
    throw new ValidationError(issues);
  }

  const total = sumWeights(merged);
  if (total === 0) {
    log.warn('All weights are zero, using defaults');
    return { ...DEFAULT_WEIGHTS };
  }

  if (Math.abs(total - 1) <= SUM_TOLERANCE) {
    return merged;
  }

  const normalised = { ...merged };
  for (const criterion of CRITERIA) {
    normalised[criterion] = merged[criterion] / total;
  }
  return normalised;
}
