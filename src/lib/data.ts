/**
 * Data Table
 *
 * The offerings table is read once, checked record by record, and frozen.
 * Nothing downstream mutates it.
 */

import fs from 'node:fs';
import { CATEGORIES, type CategoryCutoffs, type Offering, type Ownership } from '../types';
import { DataTableError } from './errors';
import { createLogger } from './logger';

const log = createLogger('data');

const OWNERSHIPS: readonly Ownership[] = ['Government', 'Government-Aided', 'Private'];

export interface DataTable {
  readonly offerings: readonly Offering[];
  readonly branches: readonly string[];
  readonly districts: readonly string[];
}

export type DistrictCoordinates = ReadonlyMap<string, readonly [number, number]>;

// ============================================================================
// RECORD PARSING
// ============================================================================

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function requireString(raw: Record<string, unknown>, field: string, index: number): string {
  const value = raw[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new DataTableError(`"${field}" must be a non-empty string.`, index);
  }
  return value.trim();
}

function requireNumber(raw: Record<string, unknown>, field: string, index: number, min: number, max: number): number {
  const value = raw[field];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < min || value > max) {
    throw new DataTableError(`"${field}" must be a number between ${min} and ${max}.`, index);
  }
  return value;
}

function requireBoolean(raw: Record<string, unknown>, field: string, index: number): boolean {
  const value = raw[field];
  if (typeof value !== 'boolean') {
    throw new DataTableError(`"${field}" must be true or false.`, index);
  }
  return value;
}

function parseCutoffs(value: unknown, index: number): CategoryCutoffs {
  if (!isRecord(value)) {
    throw new DataTableError('"cutoffs" must be an object keyed by category.', index);
  }

  const cutoffs: Partial<CategoryCutoffs> = {};
  for (const category of CATEGORIES) {
    const cutoff = value[category];
    if (typeof cutoff !== 'number' || !Number.isFinite(cutoff) || cutoff < 0) {
      throw new DataTableError(`Missing or invalid cutoff for category ${category}.`, index);
    }
    cutoffs[category] = cutoff;
  }

  const { OC, BC, MBC, SC, ST } = cutoffs;
  if (OC === undefined || BC === undefined || MBC === undefined || SC === undefined || ST === undefined) {
    throw new DataTableError('Incomplete cutoff mapping.', index);
  }
  return Object.freeze({ OC, BC, MBC, SC, ST });
}

function parseOwnership(value: unknown, index: number): Ownership {
  const match = OWNERSHIPS.find(o => o === value);
  if (!match) {
    throw new DataTableError(`"ownership" must be one of ${OWNERSHIPS.join(', ')}.`, index);
  }
  return match;
}

/**
 * Converts one snake_case record of the seed file into a frozen Offering
 */
export function parseOffering(raw: unknown, index: number): Offering {
  if (!isRecord(raw)) {
    throw new DataTableError('Expected an object.', index);
  }

  return Object.freeze({
    collegeCode: requireString(raw, 'college_code', index),
    collegeName: requireString(raw, 'college_name', index),
    district: requireString(raw, 'district', index),
    ownership: parseOwnership(raw.ownership, index),
    branch: requireString(raw, 'branch', index).toUpperCase(),
    cutoffs: parseCutoffs(raw.cutoffs, index),
    annualFee: requireNumber(raw, 'annual_fee', index, 0, Number.MAX_SAFE_INTEGER),
    placementRate: requireNumber(raw, 'placement_rate', index, 0, 1),
    qualityScore: requireNumber(raw, 'quality_score', index, 0, 1),
    ruralSupport: requireBoolean(raw, 'rural_support', index),
    hostelAvailable: requireBoolean(raw, 'hostel_available', index),
  });
}

function uniqueSorted(values: Iterable<string>): string[] {
  return [...new Set(values)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Builds a table from raw records, preserving their order
 */
export function createDataTable(records: unknown): DataTable {
  if (!Array.isArray(records)) {
    throw new DataTableError('Offerings file must contain a JSON array.');
  }

  const offerings = Object.freeze(records.map((raw, index) => parseOffering(raw, index)));

  return Object.freeze({
    offerings,
    branches: Object.freeze(uniqueSorted(offerings.map(o => o.branch))),
    districts: Object.freeze(uniqueSorted(offerings.map(o => o.district))),
  });
}

function readJson(path: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(path, 'utf-8');
  } catch (err) {
    throw new DataTableError(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new DataTableError(`Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Reads and validates the offerings file
 */
export function loadDataTable(path: string): DataTable {
  const table = createDataTable(readJson(path));
  log.info('Loaded offerings table', {
    path,
    offerings: table.offerings.length,
    branches: table.branches.length,
    districts: table.districts.length,
  });
  return table;
}

// ============================================================================
// DISTRICT DISTANCES
// ============================================================================

/**
 * Reads district centroids stored as `{ "Name": [lat, lon] }`
 */
export function loadDistrictCoordinates(path: string): DistrictCoordinates {
  const raw = readJson(path);
  if (!isRecord(raw)) {
    throw new DataTableError(`${path} must contain an object of district coordinates.`);
  }

  const coordinates = new Map<string, readonly [number, number]>();
  for (const [district, value] of Object.entries(raw)) {
    if (!Array.isArray(value) || value.length !== 2) {
      throw new DataTableError(`Coordinates for ${district} must be [lat, lon].`);
    }
    const [lat, lon] = value;
    if (typeof lat !== 'number' || typeof lon !== 'number') {
      throw new DataTableError(`Coordinates for ${district} must be numbers.`);
    }
    coordinates.set(district.toLowerCase(), [lat, lon]);
  }
  return coordinates;
}

const EARTH_RADIUS_KM = 6371;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function haversineKm(a: readonly [number, number], b: readonly [number, number]): number {
  const dLat = toRadians(b[0] - a[0]);
  const dLon = toRadians(b[1] - a[1]);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a[0])) * Math.cos(toRadians(b[0])) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(h));
}

/**
 * Straight-line distance between two district centroids, or null when either is unknown
 */
export function distanceBetweenDistricts(
  coordinates: DistrictCoordinates,
  from: string,
  to: string
): number | null {
  const a = coordinates.get(from.trim().toLowerCase());
  const b = coordinates.get(to.trim().toLowerCase());
  if (!a || !b) return null;
  return haversineKm(a, b);
}
