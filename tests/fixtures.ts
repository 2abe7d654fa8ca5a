/**
 * Shared test records. Every lease is internally consistent unless a test overrides it.
 */

import type { Amendment, Lease } from '../src/core/types.js';
import type { IngestRequest } from '../src/ingest/schema.js';

export function makeLease(overrides: Partial<Lease> = {}): Lease {
  return {
    document_id: 'lease-1',
    tenant: 'Acme Widgets LLC',
    landlord: 'Harbor Properties Inc.',
    property_address: '100 Main Street, Suite 200',
    rentable_square_feet: 5000,
    usable_square_feet: 4500,
    commencement_date: '2024-01-01',
    expiration_date: '2029-12-31',
    base_rent_monthly: 10000,
    base_rent_annual: null,
    rent_per_square_foot: null,
    escalation_schedule: null,
    security_deposit: 20000,
    cam_terms: null,
    confidence: 1,
    missing: [],
    extraction_failed: false,
    ...overrides,
  };
}

export function makeAmendment(overrides: Partial<Amendment> = {}): Amendment {
  return {
    amendment_id: 'amend-1',
    target_lease_id: 'lease-1',
    effective_date: '2024-06-01',
    effective_until: null,
    supersedes: 'lease-1',
    ingestion_sequence: 2,
    changes: {},
    confidence: 1,
    missing: [],
    extraction_failed: false,
    ...overrides,
  };
}

export const LEASE_CANDIDATE = {
  tenant: 'Acme Widgets LLC',
  landlord: 'Harbor Properties Inc.',
  property_address: '100 Main Street, Suite 200',
  rentable_square_feet: 5000,
  commencement_date: '2024-01-01',
  expiration_date: '2029-12-31',
  base_rent_monthly: 10000,
  security_deposit: 20000,
};

export function leaseRequest(
  id: string,
  candidate: Record<string, unknown> = LEASE_CANDIDATE
): IngestRequest {
  return {
    document: { id, text: `lease text for ${id}` },
    classification: { ok: true, document_type: 'base_lease', confidence: 0.95 },
    extraction: { ok: true, candidate },
  };
}

export function amendmentRequest(
  id: string,
  candidate: Record<string, unknown>,
  text = `amendment text for ${id}`
): IngestRequest {
  return {
    document: { id, text },
    classification: { ok: true, document_type: 'amendment', confidence: 0.9 },
    extraction: { ok: true, candidate },
  };
}
