import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../../src/config/config.js';
import {
  InvalidTransitionError,
  UnknownConflictError,
  UnknownLeaseError,
} from '../../src/core/errors.js';
import { IngestionCoordinator } from '../../src/ingest/coordinator.js';
import type { IngestRequest } from '../../src/ingest/schema.js';
import { LEASE_CANDIDATE, amendmentRequest, leaseRequest } from '../fixtures.js';

const RENT_RESTATEMENT = {
  target_lease_id: 'lease-1',
  effective_date: '2024-06-01',
  supersedes: 'lease-1',
  changes: { base_rent_monthly: { prior: 10500, next: 11000 } },
};

const FIXED_NOW = () => new Date('2024-07-01T12:00:00.000Z');

describe('IngestionCoordinator', () => {
  it('should score and merge a base lease', async () => {
    const coordinator = new IngestionCoordinator({ now: FIXED_NOW });

    const receipt = await coordinator.submit(leaseRequest('lease-1'));

    expect(receipt.outcome).toBe('merged');
    expect(receipt.conflicts).toEqual([]);
    expect(receipt.document).toMatchObject({
      id: 'lease-1',
      declared_type: 'base_lease',
      classification_confidence: 0.95,
      ingested_at: '2024-07-01T12:00:00.000Z',
      ingestion_sequence: 1,
      needs_review: false,
    });
    const lease = coordinator.currentState('lease-1');
    expect(lease.confidence).toBe(1);
    expect(lease.missing).toEqual([]);
    expect(lease.base_rent_annual).toBeNull();
  });

  it('should return the conflicts an amendment opens', async () => {
    const coordinator = new IngestionCoordinator();
    await coordinator.ingest(leaseRequest('lease-1'));

    const conflicts = await coordinator.ingest(amendmentRequest('amend-1', RENT_RESTATEMENT));

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0]).toMatchObject({
      category: 'rent_conflict',
      severity: 'CRITICAL',
      field: 'base_rent_monthly',
      suggested_resolution: 'use_later_effective_date',
    });
    expect(conflicts[0].source_a.value).toBe(10000);
    expect(conflicts[0].source_b.value).toBe(10500);
    expect(coordinator.currentState('lease-1').base_rent_monthly).toBe(11000);
    expect(coordinator.history('lease-1').map((a) => a.amendment_id)).toEqual(['amend-1']);
  });

  it('should only report newly opened conflicts', async () => {
    const coordinator = new IngestionCoordinator();
    await coordinator.ingest(leaseRequest('lease-1'));
    await coordinator.ingest(amendmentRequest('amend-1', RENT_RESTATEMENT));

    const conflicts = await coordinator.ingest(
      amendmentRequest('amend-2', {
        target_lease_id: 'lease-1',
        effective_date: '2025-01-01',
        supersedes: 'amend-1',
        changes: { security_deposit: { next: 25000 } },
      })
    );

    expect(conflicts).toEqual([]);
    expect(coordinator.listConflicts('lease-1', 'open')).toHaveLength(1);
  });

  it('should ignore a document it has already seen', async () => {
    const coordinator = new IngestionCoordinator();
    await coordinator.ingest(leaseRequest('lease-1'));
    await coordinator.ingest(amendmentRequest('amend-1', RENT_RESTATEMENT));
    const before = coordinator.group('lease-1');

    const receipt = await coordinator.submit(amendmentRequest('amend-1', RENT_RESTATEMENT));

    expect(receipt.outcome).toBe('duplicate');
    expect(receipt.conflicts).toEqual([]);
    expect(coordinator.group('lease-1')).toBe(before);
    expect(coordinator.documentsList()).toHaveLength(2);
  });

  it('should honour a caller-supplied content hash', async () => {
    const coordinator = new IngestionCoordinator();
    const first = leaseRequest('lease-1');
    const second: IngestRequest = {
      ...leaseRequest('lease-1-copy'),
      document: { id: 'lease-1-copy', content_hash: 'same-bytes' },
    };
    await coordinator.submit({ ...first, document: { id: 'lease-1', content_hash: 'same-bytes' } });

    const receipt = await coordinator.submit(second);

    expect(receipt.outcome).toBe('duplicate');
    expect(receipt.document.id).toBe('lease-1');
  });

  it('should record a document whose classification failed', async () => {
    const coordinator = new IngestionCoordinator();

    const receipt = await coordinator.submit({
      document: { id: 'doc-7', text: 'unreadable scan' },
      classification: { ok: false, error: 'timeout' },
      extraction: { ok: false, error: 'not attempted' },
    });

    expect(receipt.outcome).toBe('recorded');
    expect(receipt.document.declared_type).toBe('other');
    expect(receipt.document.needs_review).toBe(true);
    expect(receipt.document.classification_confidence).toBe(0);
  });

  it('should pass needs_review through from the classifier', async () => {
    const coordinator = new IngestionCoordinator();

    const flagged = await coordinator.submit({
      document: { id: 'estoppel-1', text: 'estoppel certificate' },
      classification: { ok: true, document_type: 'estoppel', confidence: 0.6 },
      extraction: { ok: true, candidate: {} },
    });
    const trusted = await coordinator.submit({
      document: { id: 'snda-1', text: 'snda' },
      classification: { ok: true, document_type: 'snda', confidence: 0.6, needs_review: false },
      extraction: { ok: true, candidate: {} },
    });

    expect(flagged.document.needs_review).toBe(true);
    expect(trusted.document.needs_review).toBe(false);
    expect(trusted.outcome).toBe('recorded');
  });

  it('should keep a failed extraction visible but out of comparisons', async () => {
    const coordinator = new IngestionCoordinator();
    await coordinator.ingest({
      document: { id: 'lease-1', text: 'scan' },
      classification: { ok: true, document_type: 'base_lease', confidence: 0.9 },
      extraction: { ok: false, error: 'model refused' },
    });

    const lease = coordinator.currentState('lease-1');
    expect(lease.confidence).toBe(0);
    expect(lease.extraction_failed).toBe(true);
    expect(lease.missing).toEqual([
      'base_rent_monthly',
      'commencement_date',
      'expiration_date',
      'landlord',
      'property_address',
      'rentable_square_feet',
      'tenant',
    ]);

    const conflicts = await coordinator.ingest(amendmentRequest('amend-1', RENT_RESTATEMENT));
    expect(conflicts).toEqual([]);
  });

  it('should treat a candidate that fails validation as a failed extraction', async () => {
    const coordinator = new IngestionCoordinator();
    await coordinator.ingest(leaseRequest('lease-1', { ...LEASE_CANDIDATE, base_rent_monthly: 'ten thousand' }));

    expect(coordinator.currentState('lease-1').confidence).toBe(0);
    expect(coordinator.currentState('lease-1').extraction_failed).toBe(true);
    expect(coordinator.currentState('lease-1').tenant).toBeNull();
  });

  it('should route a failed amendment extraction by the lease hint', async () => {
    const coordinator = new IngestionCoordinator();
    await coordinator.ingest(leaseRequest('lease-1'));

    const receipt = await coordinator.submit({
      document: { id: 'amend-1', text: 'blurry', lease_id: 'lease-1' },
      classification: { ok: true, document_type: 'amendment', confidence: 0.8 },
      extraction: { ok: false, error: 'timeout' },
    });

    expect(receipt.outcome).toBe('merged');
    expect(receipt.conflicts).toEqual([]);
    const [amendment] = coordinator.history('lease-1');
    expect(amendment.extraction_failed).toBe(true);
    expect(amendment.confidence).toBeCloseTo(1 / 3);
    expect(amendment.missing).toEqual(['effective_date', 'supersedes']);
  });

  it('should compare an amendment that names its lease only through the hint', async () => {
    const coordinator = new IngestionCoordinator();
    await coordinator.ingest(leaseRequest('lease-1'));

    const receipt = await coordinator.submit({
      document: { id: 'amend-1', text: 'rent restated', lease_id: 'lease-1' },
      classification: { ok: true, document_type: 'amendment', confidence: 0.9 },
      extraction: {
        ok: true,
        candidate: { changes: { base_rent_monthly: { prior: 10500, next: 11000 } } },
      },
    });

    expect(receipt.outcome).toBe('merged');
    expect(receipt.conflicts.map((c) => [c.category, c.field])).toEqual([
      ['rent_conflict', 'base_rent_monthly'],
      ['term_conflict', 'supersedes'],
    ]);
    const [amendment] = coordinator.history('lease-1');
    expect(amendment.extraction_failed).toBe(false);
    expect(amendment.confidence).toBeCloseTo(1 / 3);
    expect(amendment.missing).toEqual(['effective_date', 'supersedes']);
    expect(coordinator.currentState('lease-1').base_rent_monthly).toBe(11000);
  });

  it('should park an amendment for an unknown lease and merge it on arrival', async () => {
    const coordinator = new IngestionCoordinator();

    await expect(coordinator.ingest(amendmentRequest('amend-1', RENT_RESTATEMENT))).rejects.toThrow(
      UnknownLeaseError
    );
    expect(coordinator.pendingAmendments('lease-1')).toHaveLength(1);
    await expect(coordinator.ingest(amendmentRequest('amend-1', RENT_RESTATEMENT))).rejects.toThrow(
      'Amendment amend-1 targets unknown lease lease-1; parked until it arrives'
    );

    const conflicts = await coordinator.ingest(leaseRequest('lease-1'));

    expect(conflicts.map((c) => c.category)).toEqual(['rent_conflict']);
    expect(coordinator.pendingAmendments('lease-1')).toEqual([]);
    expect(coordinator.history('lease-1').map((a) => a.amendment_id)).toEqual(['amend-1']);
  });

  it('should rescore the merged lease when an amendment supplies a missing field', async () => {
    const coordinator = new IngestionCoordinator();
    const { property_address: _address, ...withoutAddress } = LEASE_CANDIDATE;
    await coordinator.ingest({
      ...leaseRequest('lease-1', withoutAddress),
      extraction: { ok: true, candidate: withoutAddress, not_found: ['property_address'] },
    });
    expect(coordinator.currentState('lease-1').missing).toEqual(['property_address']);

    await coordinator.ingest(
      amendmentRequest('amend-1', {
        target_lease_id: 'lease-1',
        effective_date: '2024-06-01',
        supersedes: 'lease-1',
        changes: { property_address: { next: '200 Oak Avenue' } },
      })
    );

    const lease = coordinator.currentState('lease-1');
    expect(lease.property_address).toBe('200 Oak Avenue');
    expect(lease.confidence).toBe(1);
    expect(lease.missing).toEqual([]);
  });

  it('should ingest different leases concurrently', async () => {
    const coordinator = new IngestionCoordinator();

    await Promise.all([
      coordinator.ingest(leaseRequest('lease-1')),
      coordinator.ingest(leaseRequest('lease-2', { ...LEASE_CANDIDATE, tenant: 'Beta Corp' })),
    ]);

    expect(coordinator.graph.leaseIds()).toEqual(['lease-1', 'lease-2']);
    expect(coordinator.documentsList().map((d) => d.ingestion_sequence)).toEqual([1, 2]);
  });

  it('should use the configured threshold for suggestions', async () => {
    const coordinator = new IngestionCoordinator({
      config: resolveConfig({ resolution: { confidence_threshold: 1 } }),
    });
    await coordinator.ingest(leaseRequest('lease-1'));

    const [conflict] = await coordinator.ingest(
      amendmentRequest('amend-1', { ...RENT_RESTATEMENT, supersedes: undefined, effective_until: '2025-01-01' })
    );

    expect(conflict.category).toBe('rent_conflict');
    expect(conflict.suggested_resolution).toBe('manual_review');
  });

  describe('resolve', () => {
    it('should move a conflict through its lifecycle', async () => {
      const coordinator = new IngestionCoordinator();
      await coordinator.ingest(leaseRequest('lease-1'));
      const [conflict] = await coordinator.ingest(amendmentRequest('amend-1', RENT_RESTATEMENT));

      const resolved = await coordinator.resolve(conflict.id, 'resolve', 'landlord confirmed');
      const again = await coordinator.resolve(conflict.id, 'resolve');

      expect(resolved.status).toBe('resolved');
      expect(again).toBe(resolved);
      await expect(coordinator.resolve(conflict.id, 'ignore')).rejects.toThrow(InvalidTransitionError);
      expect(coordinator.listConflicts('lease-1', 'open')).toEqual([]);
      expect(coordinator.listConflicts('lease-1', 'resolved')).toHaveLength(1);
    });

    it('should reject an unknown conflict id', async () => {
      const coordinator = new IngestionCoordinator();
      await expect(coordinator.resolve('cf-missing', 'resolve')).rejects.toThrow(UnknownConflictError);
    });
  });
});
