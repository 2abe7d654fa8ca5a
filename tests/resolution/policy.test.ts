import { describe, it, expect } from 'vitest';
import { InvalidTransitionError } from '../../src/core/errors.js';
import type { ConflictRecord, ConflictSource } from '../../src/core/types.js';
import { ResolutionPolicy } from '../../src/resolution/policy.js';

function source(documentId: string, effectiveDate: string | null, confidence: number): ConflictSource {
  return { document_id: documentId, value: 1, effective_date: effectiveDate, confidence };
}

function conflict(status: ConflictRecord['status'] = 'open'): ConflictRecord {
  return {
    id: 'cf-0000000000000001',
    lease_id: 'lease-1',
    category: 'rent_conflict',
    severity: 'CRITICAL',
    field: 'base_rent_monthly',
    source_a: source('lease-1', '2024-01-01', 1),
    source_b: source('amend-1', '2024-06-01', 0.9),
    description: 'test',
    suggested_resolution: 'use_later_effective_date',
    status,
  };
}

describe('ResolutionPolicy.suggest', () => {
  const policy = new ResolutionPolicy();

  it('should prefer the later effective date', () => {
    expect(
      policy.suggest({ source_a: source('a', '2024-01-01', 1), source_b: source('b', '2024-06-01', 0.7) })
    ).toBe('use_later_effective_date');
  });

  it('should not care which side is later', () => {
    expect(
      policy.suggest({ source_a: source('a', '2025-01-01', 0.8), source_b: source('b', '2024-06-01', 0.2) })
    ).toBe('use_later_effective_date');
  });

  it('should ask for review when the later document is below the threshold', () => {
    expect(
      policy.suggest({ source_a: source('a', '2024-01-01', 1), source_b: source('b', '2024-06-01', 0.69) })
    ).toBe('manual_review');
  });

  it('should fall back to confidence when dates tie', () => {
    expect(
      policy.suggest({ source_a: source('a', '2024-06-01', 0.9), source_b: source('b', '2024-06-01', 0.5) })
    ).toBe('use_higher_confidence');
    expect(
      policy.suggest({ source_a: source('a', null, 0.6), source_b: source('b', '2024-06-01', 0.5) })
    ).toBe('manual_review');
    expect(
      policy.suggest({ source_a: source('a', null, 0.9), source_b: source('b', null, 0.9) })
    ).toBe('manual_review');
  });

  it('should honour a configured threshold', () => {
    const strict = new ResolutionPolicy({ confidenceThreshold: 0.95 });
    expect(
      strict.suggest({ source_a: source('a', '2024-01-01', 1), source_b: source('b', '2024-06-01', 0.9) })
    ).toBe('manual_review');
  });
});

describe('ResolutionPolicy.applyTransition', () => {
  const policy = new ResolutionPolicy();

  it('should resolve or ignore an open conflict without mutating it', () => {
    const open = conflict();

    expect(policy.applyTransition(open, 'resolve').status).toBe('resolved');
    expect(policy.applyTransition(open, 'ignore', 'known typo')).toMatchObject({
      status: 'ignored',
      note: 'known typo',
    });
    expect(open.status).toBe('open');
  });

  it('should be idempotent', () => {
    const resolved = conflict('resolved');
    expect(policy.applyTransition(resolved, 'resolve')).toBe(resolved);
  });

  it('should reject a different decision on a decided conflict', () => {
    expect(() => policy.applyTransition(conflict('resolved'), 'ignore')).toThrow(InvalidTransitionError);
    expect(() => policy.applyTransition(conflict('ignored'), 'resolve')).toThrow(
      'Cannot resolve conflict cf-0000000000000001: status is already ignored'
    );
  });
});
