export const CATEGORIES = ['OC', 'BC', 'MBC', 'SC', 'ST'] as const;

export type Category = (typeof CATEGORIES)[number];

export type CategoryCutoffs = Record<Category, number>;

export type Ownership = 'Government' | 'Government-Aided' | 'Private';

export interface Offering {
  collegeCode: string;
  collegeName: string;
  district: string;
  ownership: Ownership;
  branch: string;
  cutoffs: CategoryCutoffs;
  annualFee: number;
  placementRate: number; // 0..1
  qualityScore: number; // 0..1
  ruralSupport: boolean;
  hostelAvailable: boolean;
}

export interface StudentProfile {
  name?: string;
  cutoff: number;
  category: Category;
  preferredBranches: string[];
  district: string;
  budget: number;
  ruralOrFirstGen: boolean;
  needHostel: boolean;
}

export const CRITERIA = ['affordability', 'proximity', 'placements', 'quality', 'diversity'] as const;

export type Criterion = (typeof CRITERIA)[number];

export type Weights = Record<Criterion, number>;

export interface CriterionScore {
  score: number; // 0..1
  weight: number;
  contribution: number;
}

export type ScoreBreakdown = Record<Criterion, CriterionScore>;

export interface ScoredRecommendation {
  offering: Offering;
  totalScore: number;
  breakdown: ScoreBreakdown;
  eligibilityMargin: number;
  withinBudget: boolean;
  reasons: string[];
  notes: string[];
}

// ============================================================================
// WIRE SHAPES
// ============================================================================

export interface RecommendationRequestBody {
  name?: string;
  cutoff: number;
  category: string;
  preferred_branches?: string[];
  district: string;
  budget: number;
  rural_or_first_gen?: boolean;
  need_hostel?: boolean;
  weights?: Partial<Weights>;
  top_k?: number;
}

export interface RecommendationItem {
  rank: number;
  college_code: string;
  college: string;
  branch: string;
  district: string;
  ownership: Ownership;
  fee: number;
  placement_rate: number;
  quality_score: number;
  distance_km: number | null;
  eligibility_margin: number;
  total_score: number;
  breakdown: ScoreBreakdown;
  explanation: {
    reasons: string[];
    notes: string[];
  };
}

export interface RecommendationResponse {
  results: RecommendationItem[];
  /** Eligible offerings before the top_k cut */
  total: number;
  weights: Weights;
}

export interface OptionsResponse {
  categories: Category[];
  branches: string[];
  districts: string[];
  default_weights: Weights;
}

// ============================================================================
// ROUTES
// ============================================================================

export interface ApiContext {
  request: Request;
}

/**
 * Fetch-style route handler; mountable by any runtime that speaks Request/Response
 */
export type ApiRoute = (context: ApiContext) => Promise<Response>;
