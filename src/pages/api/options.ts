import type { ApiRoute } from '../../types';
import { createLogger } from '../../lib/logger';
import { getOptions } from '../../lib/recommend';
import { getRuntime } from '../../lib/runtime';
import { jsonResponse } from '../../lib/validation';

const log = createLogger('api/options');

export const GET: ApiRoute = async () => {
  try {
    return jsonResponse(getOptions(getRuntime().table), 200, {
      'Cache-Control': 'public, max-age=3600', // Cache for 1 hour
    });
  } catch (err) {
    log.error('Failed to list options', err);
    return jsonResponse({ error: 'Unexpected error' }, 500);
  }
};
