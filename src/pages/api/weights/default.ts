import type { ApiRoute } from '../../../types';
import { jsonResponse } from '../../../lib/validation';
import { DEFAULT_WEIGHTS } from '../../../lib/weights';

export const GET: ApiRoute = async () =>
  jsonResponse(DEFAULT_WEIGHTS, 200, { 'Cache-Control': 'public, max-age=3600' });
