/**
 * Core type definitions for documents, leases, amendments and conflicts.
 */

export const DOCUMENT_TYPES = [
  'base_lease',
  'amendment',
  'sublease',
  'assignment',
  'estoppel',
  'snda',
  'other',
] as const;

/**
 * Document types the classification oracle can assign.
 */
export type DocumentType = (typeof DOCUMENT_TYPES)[number];

/**
 * An ingested source document. Immutable once created.
 */
export interface LeaseDocument {
  id: string;
  declared_type: DocumentType;
  classification_confidence: number;
  ingested_at: string;
  content_hash: string;
  ingestion_sequence: number;
  needs_review: boolean;
}

/**
 * A scheduled rent increase.
 */
export interface RentEscalation {
  effective_date: string | null;
  kind: 'fixed_percentage' | 'fixed_amount' | 'cpi' | 'market_rate';
  percentage?: number | null;
  amount?: number | null;
  frequency_months?: number | null;
}

/**
 * Common area maintenance (operating expense) terms.
 */
export interface CamTerms {
  base_year?: number | null;
  base_amount?: number | null;
  tenant_share_percentage?: number | null;
  cap_percentage?: number | null;
}

/**
 * The substantive terms of a lease. Every field may be absent after extraction.
 */
export interface LeaseTerms {
  tenant: string | null;
  landlord: string | null;
  property_address: string | null;
  rentable_square_feet: number | null;
  usable_square_feet: number | null;
  commencement_date: string | null;
  expiration_date: string | null;
  base_rent_monthly: number | null;
  base_rent_annual: number | null;
  rent_per_square_foot: number | null;
  escalation_schedule: RentEscalation[] | null;
  security_deposit: number | null;
  cam_terms: CamTerms | null;
}

export type LeaseField = keyof LeaseTerms;

export const LEASE_FIELDS: readonly LeaseField[] = [
  'tenant',
  'landlord',
  'property_address',
  'rentable_square_feet',
  'usable_square_feet',
  'commencement_date',
  'expiration_date',
  'base_rent_monthly',
  'base_rent_annual',
  'rent_per_square_foot',
  'escalation_schedule',
  'security_deposit',
  'cam_terms',
];

/**
 * A lease record. As stored in a group it is the merged, current state of the
 * base lease after folding every known amendment.
 */
export interface Lease extends LeaseTerms {
  document_id: string;
  confidence: number;
  missing: string[];
  /** Set when the extraction oracle failed; such records take no part in comparisons. */
  extraction_failed: boolean;
}

/**
 * One entry of an amendment's change-set. `next` supersedes the current value;
 * `prior` is what the amendment claims the value was and never merges.
 */
export interface FieldChange<K extends LeaseField = LeaseField> {
  prior?: LeaseTerms[K];
  next?: LeaseTerms[K];
}

export type ChangeSet = { [K in LeaseField]?: FieldChange<K> };

/**
 * An amendment to a base lease. Immutable once created; its position in the
 * chain is derived from `effective_date` and `ingestion_sequence`.
 */
export interface Amendment {
  amendment_id: string;
  target_lease_id: string;
  effective_date: string | null;
  effective_until: string | null;
  supersedes: string | null;
  ingestion_sequence: number;
  changes: ChangeSet;
  confidence: number;
  missing: string[];
  extraction_failed: boolean;
}

/**
 * Conflict categories.
 */
export type ConflictCategory =
  | 'term_conflict'
  | 'rent_conflict'
  | 'party_conflict'
  | 'property_conflict'
  | 'date_sequence'
  | 'calculation_error';

export type Severity = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW';

/**
 * Severity is fixed by category.
 */
export const SEVERITY_BY_CATEGORY: Readonly<Record<ConflictCategory, Severity>> = {
  rent_conflict: 'CRITICAL',
  term_conflict: 'HIGH',
  property_conflict: 'HIGH',
  date_sequence: 'HIGH',
  party_conflict: 'MEDIUM',
  calculation_error: 'MEDIUM',
};

export const SEVERITY_ORDER: readonly Severity[] = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'];

export type Resolution =
  | 'use_later_effective_date'
  | 'use_higher_confidence'
  | 'manual_review';

export type ConflictStatus = 'open' | 'resolved' | 'ignored';

export type Decision = 'resolve' | 'ignore';

export type ConflictValue = string | number | null;

/**
 * One side of a conflict: the document and the value it claims.
 */
export interface ConflictSource {
  document_id: string;
  value: ConflictValue;
  effective_date: string | null;
  confidence: number;
}

/**
 * A detected contradiction between two documents of the same group.
 */
export interface ConflictRecord {
  id: string;
  lease_id: string;
  category: ConflictCategory;
  severity: Severity;
  field: string;
  source_a: ConflictSource;
  source_b: ConflictSource;
  description: string;
  suggested_resolution: Resolution;
  status: ConflictStatus;
  note?: string;
}

/**
 * Published, immutable view of a lease group.
 */
export interface LeaseGroupSnapshot {
  lease_id: string;
  base: Lease;
  lease: Lease;
  amendments: readonly Amendment[];
  conflicts: readonly ConflictRecord[];
  suspect_amendment_ids: readonly string[];
}
