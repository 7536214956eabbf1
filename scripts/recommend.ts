/**
 * Prints recommendations for a request file.
 *
 *   npm run recommend -- data/sample-request.json
 */

import fs from 'node:fs';
import { pathToFileURL } from 'node:url';
import type { RecommendationItem } from '../src/types';
import { isValidationError } from '../src/lib/errors';
import { recommend, toRecommendationItems } from '../src/lib/recommend';
import { getRuntime } from '../src/lib/runtime';

export function formatItem(item: RecommendationItem): string {
  const lines = [
    `${item.rank}. ${item.college} (${item.college_code}) - ${item.branch}`,
    `   ${item.district} · ${item.ownership} · ₹${item.fee.toLocaleString('en-IN')}/yr · score ${item.total_score.toFixed(4)}`,
    ...item.explanation.reasons.map(reason => `   - ${reason}`),
    ...item.explanation.notes.map(note => `   ! ${note}`),
  ];
  return lines.join('\n');
}

export function run(args: string[], write: (line: string) => void = console.log): number {
  const [requestPath] = args;
  if (!requestPath) {
    write('Usage: npm run recommend -- <request.json>');
    return 2;
  }

  let body: unknown;
  try {
    body = JSON.parse(fs.readFileSync(requestPath, 'utf-8'));
  } catch (err) {
    write(`Cannot read ${requestPath}: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }

  try {
    const { table, options, coordinates } = getRuntime();
    const { profile, recommendations, eligibleCount } = recommend(body, table, options);

    if (recommendations.length === 0) {
      write('No eligible colleges match this profile.');
      return 0;
    }

    write(`${eligibleCount} eligible offerings, showing ${recommendations.length}:\n`);
    for (const item of toRecommendationItems(recommendations, profile, coordinates)) {
      write(formatItem(item));
    }
    return 0;
  } catch (err) {
    if (isValidationError(err)) {
      err.issues.forEach(issue => write(`Invalid request: ${issue}`));
      return 1;
    }
    throw err;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  process.exitCode = run(process.argv.slice(2));
}
