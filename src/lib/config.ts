/**
 * Configuration loader
 *
 * Reads .env (if present) and then the process environment. Every tunable
 * constant of the engine has a documented default here.
 */

import dotenv from 'dotenv';
import { fileURLToPath } from 'node:url';

export interface EngineOptions {
  /** Fraction above the budget an offering's fee may reach and still be eligible */
  budgetTolerance: number;
  /** Proximity sub-score for an offering outside the student's district */
  proximityPartialCredit: number;
  /** Factor applied to every contribution when the fee exceeds the budget */
  budgetStretchPenalty: number;
  /** Number of recommendations returned when the request names none */
  topK: number;
}

export interface Config extends EngineOptions {
  dataPath: string;
  districtsPath: string;
}

export const MAX_TOP_K = 100;

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  budgetTolerance: 0.1,
  proximityPartialCredit: 0.5,
  budgetStretchPenalty: 0.9,
  topK: 10,
};

export const DEFAULT_DATA_PATH = fileURLToPath(new URL('../../data/offerings.json', import.meta.url));
export const DEFAULT_DISTRICTS_PATH = fileURLToPath(new URL('../../data/districts.json', import.meta.url));

let cachedConfig: Config | null = null;

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  min: number,
  max: number,
  integer = false
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < min || value > max || (integer && !Number.isInteger(value))) {
    throw new Error(
      `${name} must be ${integer ? 'an integer' : 'a number'} between ${min} and ${max}, got "${raw}".`
    );
  }
  return value;
}

/**
 * Build a config from an environment map without touching the cache
 */
export function configFromEnv(env: NodeJS.ProcessEnv): Config {
  return {
    dataPath: env.RECOMMENDER_DATA_PATH?.trim() || DEFAULT_DATA_PATH,
    districtsPath: env.RECOMMENDER_DISTRICTS_PATH?.trim() || DEFAULT_DISTRICTS_PATH,
    budgetTolerance: readNumber(env, 'BUDGET_TOLERANCE', DEFAULT_ENGINE_OPTIONS.budgetTolerance, 0, 1),
    proximityPartialCredit: readNumber(
      env,
      'PROXIMITY_PARTIAL_CREDIT',
      DEFAULT_ENGINE_OPTIONS.proximityPartialCredit,
      0,
      1
    ),
    budgetStretchPenalty: readNumber(
      env,
      'BUDGET_STRETCH_PENALTY',
      DEFAULT_ENGINE_OPTIONS.budgetStretchPenalty,
      0,
      1
    ),
    topK: readNumber(env, 'DEFAULT_TOP_K', DEFAULT_ENGINE_OPTIONS.topK, 1, MAX_TOP_K, true),
  };
}

/**
 * Load configuration, reading .env on first call
 */
export function loadConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  dotenv.config();
  cachedConfig = configFromEnv(process.env);
  return cachedConfig;
}

/**
 * Engine options carried by a config
 */
export function engineOptions(config: Config): EngineOptions {
  const { budgetTolerance, proximityPartialCredit, budgetStretchPenalty, topK } = config;
  return { budgetTolerance, proximityPartialCredit, budgetStretchPenalty, topK };
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
