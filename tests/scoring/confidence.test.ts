import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../src/core/errors.js';
import { isPopulated, score, sortedMissing } from '../../src/scoring/confidence.js';

const CRITICAL = ['tenant', 'landlord', 'commencement_date', 'base_rent_monthly'];
const OPTIONAL = ['security_deposit', 'cam_terms', 'escalation_schedule', 'usable_square_feet', 'notes'];

describe('score', () => {
  it('should be 1.0 when every critical field is populated and no optional is', () => {
    const result = score(
      { tenant: 'Acme', landlord: 'Harbor', commencement_date: '2024-01-01', base_rent_monthly: 10000 },
      CRITICAL,
      OPTIONAL
    );

    expect(result.confidence).toBe(1);
    expect(result.missing.size).toBe(0);
  });

  it('should be 0.0 when nothing is populated', () => {
    const result = score({}, CRITICAL, OPTIONAL);

    expect(result.confidence).toBe(0);
    expect(sortedMissing(result.missing)).toEqual([
      'base_rent_monthly',
      'commencement_date',
      'landlord',
      'tenant',
    ]);
  });

  it('should add 0.05 per populated optional field', () => {
    const result = score(
      { tenant: 'Acme', landlord: 'Harbor', commencement_date: '2024-01-01', security_deposit: 1, cam_terms: {} },
      CRITICAL,
      OPTIONAL
    );

    expect(result.confidence).toBeCloseTo(0.85);
    expect(sortedMissing(result.missing)).toEqual(['base_rent_monthly']);
  });

  it('should cap the optional bonus at 0.2', () => {
    const result = score(
      {
        tenant: 'Acme',
        landlord: 'Harbor',
        security_deposit: 1,
        cam_terms: {},
        escalation_schedule: [],
        usable_square_feet: 10,
        notes: 'x',
      },
      CRITICAL,
      OPTIONAL
    );

    expect(result.confidence).toBeCloseTo(0.7);
  });

  it('should never exceed 1.0', () => {
    const result = score(
      {
        tenant: 'Acme',
        landlord: 'Harbor',
        commencement_date: '2024-01-01',
        base_rent_monthly: 10000,
        security_deposit: 1,
      },
      CRITICAL,
      OPTIONAL
    );

    expect(result.confidence).toBe(1);
  });

  it('should count empty strings as missing', () => {
    const result = score({ tenant: '', landlord: 'Harbor' }, ['tenant', 'landlord'], []);

    expect(result.confidence).toBe(0.5);
    expect(sortedMissing(result.missing)).toEqual(['tenant']);
  });

  it('should seed missing fields the extraction could not find', () => {
    const result = score(
      { tenant: 'Acme', landlord: 'Harbor', commencement_date: '2024-01-01', base_rent_monthly: 1 },
      CRITICAL,
      OPTIONAL,
      ['security_deposit', 'tenant']
    );

    expect(result.confidence).toBe(1);
    expect(sortedMissing(result.missing)).toEqual(['security_deposit']);
  });

  it('should reject an empty critical field list', () => {
    expect(() => score({ tenant: 'Acme' }, [], OPTIONAL)).toThrow(ConfigurationError);
  });

  it('should be deterministic', () => {
    const record = { tenant: 'Acme', cam_terms: {} };
    expect(score(record, CRITICAL, OPTIONAL)).toEqual(score(record, CRITICAL, OPTIONAL));
  });
});

describe('isPopulated', () => {
  it('should treat zero and false as populated', () => {
    expect(isPopulated(0)).toBe(true);
    expect(isPopulated(false)).toBe(true);
    expect(isPopulated(null)).toBe(false);
    expect(isPopulated(undefined)).toBe(false);
  });
});
