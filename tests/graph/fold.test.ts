import { describe, it, expect } from 'vitest';
import {
  compareAmendmentOrder,
  foldAmendments,
  sortAmendments,
  walkChain,
} from '../../src/graph/fold.js';
import { makeAmendment, makeLease } from '../fixtures.js';

describe('sortAmendments', () => {
  it('should order by effective date, then ingestion sequence', () => {
    const sorted = sortAmendments([
      makeAmendment({ amendment_id: 'a', effective_date: '2024-09-01', ingestion_sequence: 2 }),
      makeAmendment({ amendment_id: 'z', effective_date: '2024-03-01', ingestion_sequence: 5 }),
      makeAmendment({ amendment_id: 'b', effective_date: '2024-03-01', ingestion_sequence: 3 }),
    ]);

    expect(sorted.map((a) => a.amendment_id)).toEqual(['b', 'z', 'a']);
  });

  it('should never break ties by id', () => {
    const first = makeAmendment({ amendment_id: 'z', ingestion_sequence: 1 });
    const second = makeAmendment({ amendment_id: 'a', ingestion_sequence: 2 });

    expect(compareAmendmentOrder(first, second)).toBeLessThan(0);
  });

  it('should put undated amendments last', () => {
    const sorted = sortAmendments([
      makeAmendment({ amendment_id: 'undated', effective_date: null, ingestion_sequence: 1 }),
      makeAmendment({ amendment_id: 'dated', effective_date: '2030-01-01', ingestion_sequence: 2 }),
    ]);

    expect(sorted.map((a) => a.amendment_id)).toEqual(['dated', 'undated']);
  });
});

describe('walkChain', () => {
  it('should track the previous document and who set each field', () => {
    const steps = walkChain(makeLease(), [
      makeAmendment({
        amendment_id: 'amend-2',
        effective_date: '2025-01-01',
        ingestion_sequence: 3,
        changes: { tenant: { next: 'Beta Corp' } },
      }),
      makeAmendment({
        amendment_id: 'amend-1',
        changes: { base_rent_monthly: { next: 11000 } },
      }),
    ]);

    expect(steps.map((s) => s.previousDocumentId)).toEqual(['lease-1', 'amend-1']);
    expect(steps[0].before.base_rent_monthly).toBe(10000);
    expect(steps[0].after.base_rent_monthly).toBe(11000);
    expect(steps[1].setByBefore.get('base_rent_monthly')).toBe('amend-1');
    expect(steps[1].setByAfter.get('tenant')).toBe('amend-2');
    expect(steps[1].setByAfter.get('landlord')).toBe('lease-1');
  });
});

describe('foldAmendments', () => {
  it('should return the base terms without amendments', () => {
    const terms = foldAmendments(makeLease(), []);
    expect(terms.base_rent_monthly).toBe(10000);
    expect(terms).not.toHaveProperty('document_id');
  });

  it('should merge only new values', () => {
    const terms = foldAmendments(makeLease(), [
      makeAmendment({
        changes: {
          base_rent_monthly: { prior: 10500 },
          expiration_date: { prior: '2029-12-31', next: '2032-12-31' },
        },
      }),
    ]);

    expect(terms.base_rent_monthly).toBe(10000);
    expect(terms.expiration_date).toBe('2032-12-31');
  });

  it('should let a later effective date win', () => {
    const terms = foldAmendments(makeLease(), [
      makeAmendment({
        amendment_id: 'late',
        effective_date: '2025-01-01',
        ingestion_sequence: 2,
        changes: { base_rent_monthly: { next: 12000 } },
      }),
      makeAmendment({
        amendment_id: 'early',
        effective_date: '2024-06-01',
        ingestion_sequence: 3,
        changes: { base_rent_monthly: { next: 11000 } },
      }),
    ]);

    expect(terms.base_rent_monthly).toBe(12000);
  });
});
