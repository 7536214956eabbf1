import Fuse, { type IFuseOptions } from 'fuse.js';
import { createLogger } from './logger';

const log = createLogger('search');

// ============================================================================
// SEARCH CONFIGURATION
// ============================================================================

export const DEFAULT_SEARCH_OPTIONS: IFuseOptions<BranchTerm> = {
  keys: ['term'],
  threshold: 0.4,
  minMatchCharLength: 2,
  shouldSort: true,
  includeScore: true,
  ignoreLocation: true,
  ignoreFieldNorm: true, // score stays errors / query length
};

// A fuzzy hit must be a single typo of a known code or alias
const MIN_FUZZY_LENGTH = 4;
const MAX_FUZZY_EDITS = 1;

/**
 * Common ways students write each branch, lower case
 */
export const BRANCH_ALIASES: Readonly<Record<string, readonly string[]>> = {
  CSE: ['cs', 'computer science', 'computer science and engineering', 'computer engineering'],
  IT: ['information technology'],
  ECE: ['ec', 'electronics and communication', 'electronics and communication engineering'],
  EEE: ['ee', 'electrical', 'electrical and electronics', 'electrical and electronics engineering'],
  MECH: ['mechanical', 'mechanical engineering', 'me'],
  CIVIL: ['civil engineering', 'ce'],
  AIDS: ['ai&ds', 'ai and ds', 'artificial intelligence and data science', 'ai ds'],
};

/**
 * Common short forms of district names, lower case
 */
export const DISTRICT_ALIASES: Readonly<Record<string, string>> = {
  madras: 'Chennai',
  kovai: 'Coimbatore',
  trichy: 'Tiruchirappalli',
  tiruchi: 'Tiruchirappalli',
  tanjore: 'Thanjavur',
  nellai: 'Tirunelveli',
};

export interface BranchTerm {
  code: string;
  term: string;
}

// ============================================================================
// SEARCH CACHE
// ============================================================================

const searchCache = new Map<string, Fuse<BranchTerm>>();

// Export cache clearing function for testing
export function clearSearchCache(): void {
  searchCache.clear();
}

function branchTerms(knownBranches: readonly string[]): BranchTerm[] {
  return knownBranches.flatMap((code) => [
    { code, term: code.toLowerCase() },
    ...(BRANCH_ALIASES[code] ?? []).map((term) => ({ code, term })),
  ]);
}

/**
 * Creates (or reuses) a Fuse index over the branch codes and their aliases
 */
function branchIndex(knownBranches: readonly string[]): Fuse<BranchTerm> {
  const cacheKey = knownBranches.join('|');
  const cached = searchCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const fuse = new Fuse(branchTerms(knownBranches), DEFAULT_SEARCH_OPTIONS);
  searchCache.set(cacheKey, fuse);
  return fuse;
}

// ============================================================================
// BRANCH RESOLUTION
// ============================================================================

/**
 * Resolves a typed branch name to one of the known branch codes.
 * Tries the code itself, then aliases, then fuzzy matching. The fuzzy step
 * only accepts a one-character typo of a code or alias, so a branch the table
 * does not offer ("Mechatronics", "EIE") stays unresolved.
 */
export function resolveBranch(name: string, knownBranches: readonly string[]): string | null {
  const trimmed = name.trim();
  if (trimmed.length === 0) return null;

  const upper = trimmed.toUpperCase();
  if (knownBranches.includes(upper)) return upper;

  const lower = trimmed.toLowerCase().replace(/\s+/g, ' ');
  for (const code of knownBranches) {
    if (BRANCH_ALIASES[code]?.includes(lower)) return code;
  }

  if (lower.length < MIN_FUZZY_LENGTH) return null;

  const maxScore = MAX_FUZZY_EDITS / lower.length + 1e-9;
  const hit = branchIndex(knownBranches)
    .search(lower)
    .find(
      ({ item, score = 1 }) =>
        score <= maxScore && Math.abs(item.term.length - lower.length) <= MAX_FUZZY_EDITS
    );
  return hit ? hit.item.code : null;
}

export interface BranchResolution {
  /** Known branch codes, first-mention order, without duplicates */
  resolved: string[];
  /** Names that matched nothing, upper-cased */
  unresolved: string[];
}

export function resolveBranches(names: readonly string[], knownBranches: readonly string[]): BranchResolution {
  const resolved: string[] = [];
  const unresolved: string[] = [];

  for (const name of names) {
    const code = resolveBranch(name, knownBranches);
    if (code === null) {
      const fallback = name.trim().toUpperCase();
      if (fallback && !unresolved.includes(fallback)) unresolved.push(fallback);
    } else if (!resolved.includes(code)) {
      resolved.push(code);
    }
  }

  if (unresolved.length > 0) {
    log.warn('Unrecognised branch names', { unresolved });
  }

  return { resolved, unresolved };
}

// ============================================================================
// DISTRICT RESOLUTION
// ============================================================================

/**
 * Maps a typed district to the table's spelling. Unknown names are returned trimmed.
 */
export function resolveDistrict(name: string, knownDistricts: readonly string[]): string {
  const lower = name.trim().toLowerCase();

  const exact = knownDistricts.find((d) => d.toLowerCase() === lower);
  if (exact) return exact;

  const alias = DISTRICT_ALIASES[lower];
  if (alias && knownDistricts.includes(alias)) return alias;

  return name.trim();
}
