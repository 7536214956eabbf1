/**
 * Input Validation
 *
 * Checks request bodies at the boundary so the engine only ever sees a
 * well-formed StudentProfile:
 * - Category from the closed OC/BC/MBC/SC/ST set
 * - Cutoff and budget numeric and in range
 * - Weights non-negative
 * - Strings free of control characters
 */

import { CATEGORIES, CRITERIA, type Category, type StudentProfile, type Weights } from '../types';
import { MAX_TOP_K } from './config';

export const MAX_CUTOFF = 200;
const MAX_BRANCHES = 20;
const MAX_TEXT_LENGTH = 100;

// ============================================================================
// TYPE VALIDATORS
// ============================================================================

/**
 * Accepts a category in any case, e.g. "bc" → "BC"
 */
export function parseCategory(value: unknown): Category | null {
  if (typeof value !== 'string') return null;
  const upper = value.trim().toUpperCase();
  return CATEGORIES.find(c => c === upper) ?? null;
}

/**
 * Validates that a value is a valid cutoff mark (0-200)
 */
export function isValidCutoff(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= MAX_CUTOFF;
}

/**
 * Validates that a value is a non-negative annual budget
 */
export function isValidBudget(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

/**
 * Validates that a string is a usable short text field
 * - No control characters
 * - 1-100 characters once trimmed
 */
export function isValidText(value: unknown): value is string {
  if (typeof value !== 'string') return false;
  const trimmed = value.trim();
  if (trimmed.length > MAX_TEXT_LENGTH) return false;
  if (/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/.test(trimmed)) return false;
  return trimmed.length >= 1;
}

/**
 * Sanitises a string for safe logging/output
 */
export function sanitizeString(value: unknown, maxLength = MAX_TEXT_LENGTH): string {
  if (typeof value !== 'string') return String(value);
  let sanitized = value.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');
  if (sanitized.length > maxLength) {
    sanitized = sanitized.substring(0, maxLength) + '...';
  }
  return sanitized;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// REQUEST VALIDATION
// ============================================================================

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; issues: string[] };

export interface ParsedRequest {
  profile: StudentProfile;
  weights?: Partial<Weights>;
  topK?: number;
}

function validateWeights(value: unknown, issues: string[]): Partial<Weights> | undefined {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    issues.push('weights must be an object.');
    return undefined;
  }

  const weights: Partial<Weights> = {};
  for (const [key, weight] of Object.entries(value)) {
    const criterion = CRITERIA.find(c => c === key);
    if (!criterion) {
      issues.push(`Unknown weight "${sanitizeString(key, 40)}". Expected one of ${CRITERIA.join(', ')}.`);
    } else if (typeof weight !== 'number' || !Number.isFinite(weight) || weight < 0) {
      issues.push(`Weight "${criterion}" must be a non-negative number.`);
    } else {
      weights[criterion] = weight;
    }
  }
  return weights;
}

function validateBranches(value: unknown, issues: string[]): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || value.length > MAX_BRANCHES || !value.every(isValidText)) {
    issues.push(`preferred_branches must be a list of at most ${MAX_BRANCHES} branch names.`);
    return [];
  }
  return value.map(b => b.trim());
}

function validateFlag(body: Record<string, unknown>, field: string, issues: string[]): boolean {
  const value = body[field];
  if (value === undefined || value === null) return false;
  if (typeof value !== 'boolean') {
    issues.push(`${field} must be true or false.`);
    return false;
  }
  return value;
}

/**
 * Validates a recommendation request body and converts it to a profile
 */
export function validateRecommendationRequest(body: unknown): ValidationResult<ParsedRequest> {
  if (!isRecord(body)) {
    return { valid: false, issues: ['Request body must be a JSON object.'] };
  }

  const issues: string[] = [];

  const { cutoff, budget, district, name } = body;
  const category = parseCategory(body.category);

  if (category === null) {
    issues.push(`category is required and must be one of ${CATEGORIES.join(', ')}.`);
  }
  if (!isValidCutoff(cutoff)) {
    issues.push(`cutoff must be a number between 0 and ${MAX_CUTOFF}.`);
  }
  if (!isValidBudget(budget)) {
    issues.push('budget must be a non-negative number.');
  }
  if (!isValidText(district)) {
    issues.push(`district is required (1-${MAX_TEXT_LENGTH} characters).`);
  }
  if (name !== undefined && name !== null && !isValidText(name)) {
    issues.push(`name must be 1-${MAX_TEXT_LENGTH} characters.`);
  }

  const preferredBranches = validateBranches(body.preferred_branches, issues);
  const ruralOrFirstGen = validateFlag(body, 'rural_or_first_gen', issues);
  const needHostel = validateFlag(body, 'need_hostel', issues);
  const weights = validateWeights(body.weights, issues);

  const rawTopK = body.top_k;
  let topK: number | undefined;
  if (rawTopK !== undefined && rawTopK !== null) {
    if (typeof rawTopK !== 'number' || !Number.isInteger(rawTopK) || rawTopK < 1 || rawTopK > MAX_TOP_K) {
      issues.push(`top_k must be an integer between 1 and ${MAX_TOP_K}.`);
    } else {
      topK = rawTopK;
    }
  }

  if (
    issues.length > 0 ||
    category === null ||
    !isValidCutoff(cutoff) ||
    !isValidBudget(budget) ||
    !isValidText(district)
  ) {
    return { valid: false, issues };
  }

  const profile: StudentProfile = {
    cutoff,
    category,
    preferredBranches,
    district: district.trim(),
    budget,
    ruralOrFirstGen,
    needHostel,
  };
  if (isValidText(name)) {
    profile.name = name.trim();
  }

  return { valid: true, value: { profile, weights, topK } };
}

// ============================================================================
// API RESPONSES
// ============================================================================

/**
 * Standard security headers for API responses
 */
export const SECURITY_HEADERS: Record<string, string> = {
  'X-Content-Type-Options': 'nosniff',
  'X-Frame-Options': 'DENY',
  'X-XSS-Protection': '1; mode=block',
  'Referrer-Policy': 'strict-origin-when-cross-origin',
};

/**
 * Wraps a Response with security headers
 */
export function withSecurityHeaders(response: Response): Response {
  const newResponse = new Response(response.body, response);
  Object.entries(SECURITY_HEADERS).forEach(([key, value]) => {
    newResponse.headers.set(key, value);
  });
  return newResponse;
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return withSecurityHeaders(new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  }));
}

/**
 * Returns a standardised validation error response
 */
export function validationErrorResponse(message: string, status = 400): Response {
  return jsonResponse({ error: 'Validation Error', message }, status);
}
