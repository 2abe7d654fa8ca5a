/**
 * Amendment ordering and the fold that derives a lease's current state.
 */

import {
  LEASE_FIELDS,
  type Amendment,
  type ChangeSet,
  type FieldChange,
  type Lease,
  type LeaseField,
  type LeaseTerms,
} from '../core/types.js';

/**
 * Chain order: effective date ascending (undated last), then ingestion sequence.
 * Dates are compared as strings here; the rules validate them.
 */
export function compareAmendmentOrder(a: Amendment, b: Amendment): number {
  if (a.effective_date !== b.effective_date) {
    if (a.effective_date === null) return 1;
    if (b.effective_date === null) return -1;
    return a.effective_date < b.effective_date ? -1 : 1;
  }
  return a.ingestion_sequence - b.ingestion_sequence;
}

export function sortAmendments(amendments: readonly Amendment[]): Amendment[] {
  return [...amendments].sort(compareAmendmentOrder);
}

export function getChange<K extends LeaseField>(
  changes: ChangeSet,
  field: K
): FieldChange<K> | undefined {
  return changes[field];
}

function applyField<K extends LeaseField>(
  terms: LeaseTerms,
  changes: ChangeSet,
  field: K
): boolean {
  const change = getChange(changes, field);
  if (!change || change.next === undefined) return false;
  terms[field] = change.next;
  return true;
}

export function pickTerms(lease: LeaseTerms): LeaseTerms {
  return {
    tenant: lease.tenant,
    landlord: lease.landlord,
    property_address: lease.property_address,
    rentable_square_feet: lease.rentable_square_feet,
    usable_square_feet: lease.usable_square_feet,
    commencement_date: lease.commencement_date,
    expiration_date: lease.expiration_date,
    base_rent_monthly: lease.base_rent_monthly,
    base_rent_annual: lease.base_rent_annual,
    rent_per_square_foot: lease.rent_per_square_foot,
    escalation_schedule: lease.escalation_schedule,
    security_deposit: lease.security_deposit,
    cam_terms: lease.cam_terms,
  };
}

/**
 * Which document last set each field.
 */
export type Provenance = ReadonlyMap<LeaseField, string>;

/**
 * One amendment in chain order, with the state in force on either side of it.
 */
export interface ChainStep {
  amendment: Amendment;
  previousDocumentId: string;
  before: LeaseTerms;
  after: LeaseTerms;
  setByBefore: Provenance;
  setByAfter: Provenance;
}

/**
 * Walk the chain from the base record. Only `next` values supersede; `prior`
 * restatements are left for the rules to compare.
 */
export function walkChain(base: Lease, amendments: readonly Amendment[]): ChainStep[] {
  const steps: ChainStep[] = [];
  let terms = pickTerms(base);
  let setBy = new Map<LeaseField, string>(LEASE_FIELDS.map((field) => [field, base.document_id]));
  let previousDocumentId = base.document_id;

  for (const amendment of sortAmendments(amendments)) {
    const after = { ...terms };
    const setByAfter = new Map(setBy);
    for (const field of LEASE_FIELDS) {
      if (applyField(after, amendment.changes, field)) {
        setByAfter.set(field, amendment.amendment_id);
      }
    }
    steps.push({
      amendment,
      previousDocumentId,
      before: terms,
      after,
      setByBefore: setBy,
      setByAfter,
    });
    terms = after;
    setBy = setByAfter;
    previousDocumentId = amendment.amendment_id;
  }

  return steps;
}

/**
 * Fold every amendment onto the base record. Depends only on the sorted key,
 * never on insertion order.
 */
export function foldAmendments(base: Lease, amendments: readonly Amendment[]): LeaseTerms {
  const steps = walkChain(base, amendments);
  return steps.length > 0 ? steps[steps.length - 1].after : pickTerms(base);
}
