import type { Offering, ScoredRecommendation, StudentProfile } from '../types';

export function makeOffering(overrides: Partial<Offering> = {}): Offering {
  return {
    collegeCode: 'T001',
    collegeName: 'Test College of Engineering',
    district: 'Chennai',
    ownership: 'Government',
    branch: 'CSE',
    cutoffs: { OC: 150, BC: 150, MBC: 150, SC: 150, ST: 150 },
    annualFee: 40000,
    placementRate: 0.8,
    qualityScore: 0.7,
    ruralSupport: false,
    hostelAvailable: true,
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<StudentProfile> = {}): StudentProfile {
  return {
    cutoff: 180,
    category: 'BC',
    preferredBranches: [],
    district: 'Chennai',
    budget: 50000,
    ruralOrFirstGen: false,
    needHostel: false,
    ...overrides,
  };
}

export function makeScored(totalScore: number, offering: Partial<Offering> = {}): ScoredRecommendation {
  const empty = { score: 0, weight: 0, contribution: 0 };
  const breakdown = {
    affordability: { score: totalScore, weight: 1, contribution: totalScore },
    proximity: { ...empty },
    placements: { ...empty },
    quality: { ...empty },
    diversity: { ...empty },
  };
  return {
    offering: makeOffering(offering),
    totalScore,
    breakdown,
    eligibilityMargin: 0,
    withinBudget: true,
    reasons: [],
    notes: [],
  };
}

/**
 * Snake_case seed record, as stored in data/offerings.json
 */
export function makeRecord(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    college_code: 'T001',
    college_name: 'Test College of Engineering',
    district: 'Chennai',
    ownership: 'Government',
    branch: 'CSE',
    cutoffs: { OC: 150, BC: 150, MBC: 150, SC: 150, ST: 150 },
    annual_fee: 40000,
    placement_rate: 0.8,
    quality_score: 0.7,
    rural_support: false,
    hostel_available: true,
    ...overrides,
  };
}
