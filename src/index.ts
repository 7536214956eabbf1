export * from './types';
export { loadConfig, configFromEnv, clearConfigCache, DEFAULT_ENGINE_OPTIONS, MAX_TOP_K } from './lib/config';
export type { Config, EngineOptions } from './lib/config';
export { createDataTable, loadDataTable, loadDistrictCoordinates, distanceBetweenDistricts } from './lib/data';
export type { DataTable, DistrictCoordinates } from './lib/data';
export { filterEligible, isEligible } from './lib/eligibility';
export { ValidationError, DataTableError } from './lib/errors';
export { createLogger } from './lib/logger';
export type { Logger } from './lib/logger';
export { rankRecommendations } from './lib/ranking';
export { recommend, recommendForProfile, toRecommendationItems, getOptions } from './lib/recommend';
export type { RecommendationResult } from './lib/recommend';
export { scoreOffering, scoreOfferings } from './lib/scoring';
export { resolveBranches, resolveDistrict } from './lib/search';
export { validateRecommendationRequest } from './lib/validation';
export { DEFAULT_WEIGHTS, resolveWeights } from './lib/weights';
