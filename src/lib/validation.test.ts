import { describe, expect, it } from 'vitest';
import {
  isValidBudget,
  isValidCutoff,
  parseCategory,
  sanitizeString,
  validateRecommendationRequest,
  validationErrorResponse,
} from './validation';

const validBody = {
  cutoff: 180,
  category: 'BC',
  preferred_branches: ['CSE'],
  district: 'Chennai',
  budget: 50000,
};

function issuesOf(body: unknown): string[] {
  const result = validateRecommendationRequest(body);
  return result.valid ? [] : result.issues;
}

describe('field validators', () => {
  it('parses categories in any case', () => {
    expect(parseCategory('mbc')).toBe('MBC');
    expect(parseCategory(' ST ')).toBe('ST');
    expect(parseCategory('GEN')).toBeNull();
    expect(parseCategory(3)).toBeNull();
  });

  it('bounds cutoffs to 0-200', () => {
    expect(isValidCutoff(0)).toBe(true);
    expect(isValidCutoff(200)).toBe(true);
    expect(isValidCutoff(200.5)).toBe(false);
    expect(isValidCutoff(-1)).toBe(false);
    expect(isValidCutoff('180')).toBe(false);
    expect(isValidCutoff(Number.NaN)).toBe(false);
  });

  it('accepts only non-negative budgets', () => {
    expect(isValidBudget(0)).toBe(true);
    expect(isValidBudget(-500)).toBe(false);
    expect(isValidBudget(Number.POSITIVE_INFINITY)).toBe(false);
  });

  it('strips control characters and truncates', () => {
    expect(sanitizeString('ab\x00c')).toBe('abc');
    expect(sanitizeString('abcdef', 3)).toBe('abc...');
  });
});

describe('validateRecommendationRequest', () => {
  it('builds a profile with defaults for optional fields', () => {
    const result = validateRecommendationRequest({ ...validBody, category: 'bc', district: ' Chennai ' });

    expect(result).toEqual({
      valid: true,
      value: {
        profile: {
          cutoff: 180,
          category: 'BC',
          preferredBranches: ['CSE'],
          district: 'Chennai',
          budget: 50000,
          ruralOrFirstGen: false,
          needHostel: false,
        },
        weights: undefined,
        topK: undefined,
      },
    });
  });

  it('carries weights, top_k, flags and name through', () => {
    const result = validateRecommendationRequest({
      ...validBody,
      name: 'Kavya',
      rural_or_first_gen: true,
      need_hostel: true,
      weights: { quality: 0.5 },
      top_k: 3,
    });

    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.value.profile.name).toBe('Kavya');
    expect(result.value.profile.ruralOrFirstGen).toBe(true);
    expect(result.value.profile.needHostel).toBe(true);
    expect(result.value.weights).toEqual({ quality: 0.5 });
    expect(result.value.topK).toBe(3);
  });

  it('rejects a missing or unknown category', () => {
    const expected = ['category is required and must be one of OC, BC, MBC, SC, ST.'];

    expect(issuesOf({ ...validBody, category: undefined })).toEqual(expected);
    expect(issuesOf({ ...validBody, category: 'GEN' })).toEqual(expected);
  });

  it('rejects non-numeric or negative cutoff and budget', () => {
    expect(issuesOf({ ...validBody, cutoff: '180', budget: -1 })).toEqual([
      'cutoff must be a number between 0 and 200.',
      'budget must be a non-negative number.',
    ]);
  });

  it('rejects negative and unknown weights', () => {
    expect(issuesOf({ ...validBody, weights: { proximity: -1, hostel: 0.2 } })).toEqual([
      'Weight "proximity" must be a non-negative number.',
      'Unknown weight "hostel". Expected one of affordability, proximity, placements, quality, diversity.',
    ]);
  });

  it('rejects a malformed branch list, flag or top_k', () => {
    expect(issuesOf({ ...validBody, preferred_branches: 'CSE', need_hostel: 'yes', top_k: 0 })).toEqual([
      'preferred_branches must be a list of at most 20 branch names.',
      'need_hostel must be true or false.',
      'top_k must be an integer between 1 and 100.',
    ]);
  });

  it('rejects bodies that are not objects', () => {
    expect(issuesOf(null)).toEqual(['Request body must be a JSON object.']);
    expect(issuesOf([validBody])).toEqual(['Request body must be a JSON object.']);
  });
});

describe('validationErrorResponse', () => {
  it('returns a 400 JSON body with security headers', async () => {
    const response = validationErrorResponse('cutoff must be a number between 0 and 200.');

    expect(response.status).toBe(400);
    expect(response.headers.get('Content-Type')).toBe('application/json');
    expect(response.headers.get('X-Frame-Options')).toBe('DENY');
    expect(await response.json()).toEqual({
      error: 'Validation Error',
      message: 'cutoff must be a number between 0 and 200.',
    });
  });
});
