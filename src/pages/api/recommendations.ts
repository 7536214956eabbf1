import type { ApiRoute, RecommendationResponse } from '../../types';
import { isValidationError } from '../../lib/errors';
import { createLogger } from '../../lib/logger';
import { recommend, toRecommendationItems } from '../../lib/recommend';
import { getRuntime } from '../../lib/runtime';
import { jsonResponse, validationErrorResponse } from '../../lib/validation';

const log = createLogger('api/recommendations');

export const POST: ApiRoute = async ({ request }) => {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return validationErrorResponse('Request body must be valid JSON.');
  }

  try {
    const { table, options, coordinates } = getRuntime();
    const { profile, weights, eligibleCount, recommendations } = recommend(body, table, options);

    const response: RecommendationResponse = {
      results: toRecommendationItems(recommendations, profile, coordinates),
      total: eligibleCount,
      weights,
    };

    return jsonResponse(response, 200, { 'Cache-Control': 'no-store' });
  } catch (err) {
    if (isValidationError(err)) {
      return validationErrorResponse(err.message);
    }
    log.error('Recommendation failed', err);
    return jsonResponse({ results: [], error: 'Unexpected error' }, 500);
  }
};
