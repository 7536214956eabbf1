import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { RecommendationResponse } from '../../types';
import { DEFAULT_ENGINE_OPTIONS } from '../../lib/config';
import { createDataTable } from '../../lib/data';
import { clearRuntimeCache, setRuntime } from '../../lib/runtime';
import { makeRecord } from '../../test/fixtures';
import { POST } from './recommendations';

function post(body: string): Promise<Response> {
  const request = new Request('http://localhost/api/recommendations', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
  return POST({ request });
}

beforeEach(() => {
  setRuntime({
    options: DEFAULT_ENGINE_OPTIONS,
    table: createDataTable([
      makeRecord({ college_code: 'A', college_name: 'Alpha College', branch: 'CSE' }),
      makeRecord({ college_code: 'B', college_name: 'Beta College', branch: 'ECE', annual_fee: 90000 }),
    ]),
    coordinates: new Map(),
  });
});

afterEach(() => {
  clearRuntimeCache();
});

describe('POST /api/recommendations', () => {
  it('returns ranked recommendations', async () => {
    const response = await post(JSON.stringify({
      cutoff: 180,
      category: 'BC',
      preferred_branches: [],
      district: 'Chennai',
      budget: 50000,
    }));

    expect(response.status).toBe(200);
    expect(response.headers.get('X-Content-Type-Options')).toBe('nosniff');

    const body: RecommendationResponse = await response.json();
    expect(body.total).toBe(1);
    expect(body.results.map(r => r.college_code)).toEqual(['A']);
    expect(body.results[0].rank).toBe(1);
    expect(body.weights).toEqual({ affordability: 0.3, proximity: 0.2, placements: 0.25, quality: 0.15, diversity: 0.1 });
  });

  it('reports every eligible offering in total when top_k cuts the list', async () => {
    setRuntime({
      options: DEFAULT_ENGINE_OPTIONS,
      table: createDataTable([
        makeRecord({ college_code: 'A', college_name: 'Alpha College', branch: 'CSE' }),
        makeRecord({ college_code: 'B', college_name: 'Beta College', branch: 'ECE', annual_fee: 45000 }),
      ]),
      coordinates: new Map(),
    });

    const response = await post(JSON.stringify({
      cutoff: 180,
      category: 'BC',
      district: 'Chennai',
      budget: 50000,
      top_k: 1,
    }));

    const body: RecommendationResponse = await response.json();
    expect(body.results.map(r => r.college_code)).toEqual(['A']);
    expect(body.total).toBe(2);
  });

  it('returns an empty list when nothing is eligible', async () => {
    const response = await post(JSON.stringify({
      cutoff: 100,
      category: 'SC',
      district: 'Chennai',
      budget: 50000,
    }));

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ results: [], total: 0 });
  });

  it('rejects malformed JSON', async () => {
    const response = await post('{ not json');

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Validation Error',
      message: 'Request body must be valid JSON.',
    });
  });

  it('rejects an invalid profile', async () => {
    const response = await post(JSON.stringify({ cutoff: 180, category: 'GEN', district: 'Chennai', budget: 50000 }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: 'Validation Error',
      message: 'category is required and must be one of OC, BC, MBC, SC, ST.',
    });
  });
});
