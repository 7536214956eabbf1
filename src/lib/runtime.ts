/**
 * Process-wide state: the config, the offerings table and district centroids.
 * Loaded on first use and read-only afterwards.
 */

import { engineOptions, loadConfig, type Config, type EngineOptions } from './config';
import { loadDataTable, loadDistrictCoordinates, type DataTable, type DistrictCoordinates } from './data';

export interface Runtime {
  options: EngineOptions;
  table: DataTable;
  coordinates: DistrictCoordinates;
}

let cachedRuntime: Runtime | null = null;

export function createRuntime(config: Config): Runtime {
  return {
    options: engineOptions(config),
    table: loadDataTable(config.dataPath),
    coordinates: loadDistrictCoordinates(config.districtsPath),
  };
}

export function getRuntime(): Runtime {
  if (!cachedRuntime) {
    cachedRuntime = createRuntime(loadConfig());
  }
  return cachedRuntime;
}

/**
 * Replace the runtime (tests use this to inject a small table)
 */
export function setRuntime(runtime: Runtime): void {
  cachedRuntime = runtime;
}

export function clearRuntimeCache(): void {
  cachedRuntime = null;
}
