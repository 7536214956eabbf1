import { describe, expect, it } from 'vitest';
import { makeRecord } from '../test/fixtures';
import { DEFAULT_DATA_PATH, DEFAULT_DISTRICTS_PATH } from './config';
import {
  createDataTable,
  distanceBetweenDistricts,
  loadDataTable,
  loadDistrictCoordinates,
  parseOffering,
} from './data';
import { DataTableError } from './errors';

describe('parseOffering', () => {
  it('maps a seed record to an offering', () => {
    const offering = parseOffering(makeRecord({ branch: 'cse ' }), 0);

    expect(offering).toEqual({
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
    });
    expect(Object.isFrozen(offering)).toBe(true);
    expect(Object.isFrozen(offering.cutoffs)).toBe(true);
  });

  it('rejects an incomplete cutoff mapping', () => {
    const record = makeRecord({ cutoffs: { OC: 150, BC: 150, MBC: 150, SC: 150 } });

    expect(() => parseOffering(record, 4)).toThrow(DataTableError);
    expect(() => parseOffering(record, 4)).toThrow('Record 4: Missing or invalid cutoff for category ST.');
  });

  it('rejects rates outside 0..1 and unknown ownership', () => {
    expect(() => parseOffering(makeRecord({ placement_rate: 1.2 }), 0)).toThrow(
      'Record 0: "placement_rate" must be a number between 0 and 1.'
    );
    expect(() => parseOffering(makeRecord({ ownership: 'Trust' }), 1)).toThrow(
      'Record 1: "ownership" must be one of Government, Government-Aided, Private.'
    );
  });
});

describe('createDataTable', () => {
  it('lists unique sorted branches and districts', () => {
    const table = createDataTable([
      makeRecord({ branch: 'MECH', district: 'Salem' }),
      makeRecord({ branch: 'CSE', district: 'Chennai' }),
      makeRecord({ branch: 'MECH', district: 'Chennai' }),
    ]);

    expect(table.offerings.map(o => o.branch)).toEqual(['MECH', 'CSE', 'MECH']);
    expect(table.branches).toEqual(['CSE', 'MECH']);
    expect(table.districts).toEqual(['Chennai', 'Salem']);
    expect(Object.isFrozen(table.offerings)).toBe(true);
  });

  it('requires an array', () => {
    expect(() => createDataTable({ offerings: [] })).toThrow('Offerings file must contain a JSON array.');
  });
});

describe('seed files', () => {
  it('loads the bundled offerings table', () => {
    const table = loadDataTable(DEFAULT_DATA_PATH);

    expect(table.offerings).toHaveLength(21);
    expect(table.branches).toEqual(['AIDS', 'CIVIL', 'CSE', 'ECE', 'EEE', 'IT', 'MECH']);
    expect(table.districts).toEqual([
      'Chennai',
      'Coimbatore',
      'Madurai',
      'Salem',
      'Thanjavur',
      'Tiruchirappalli',
      'Tirunelveli',
    ]);
  });

  it('reports a missing file', () => {
    expect(() => loadDataTable('/nonexistent/offerings.json')).toThrow(DataTableError);
  });

  it('measures distances between known districts', () => {
    const coordinates = loadDistrictCoordinates(DEFAULT_DISTRICTS_PATH);

    expect(distanceBetweenDistricts(coordinates, 'Chennai', 'chennai')).toBe(0);
    expect(distanceBetweenDistricts(coordinates, 'Chennai', 'Coimbatore')).toBeCloseTo(427.43, 1);
    expect(distanceBetweenDistricts(coordinates, 'Chennai', 'Ooty')).toBeNull();
  });
});
