/**
 * Version graph: one arena per lease group holding the base record, its
 * amendment chain and its conflicts.
 *
 * Every mutation rebuilds the group from scratch (fold, rescore, rescan) and
 * publishes a frozen snapshot at the very end, so readers never observe a
 * half-merged state.
 */

import { UnknownConflictError, UnknownLeaseError } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type {
  Amendment,
  ConflictRecord,
  ConflictStatus,
  Decision,
  Lease,
  LeaseGroupSnapshot,
} from '../core/types.js';
import { deepFreeze } from '../core/values.js';
import { ConflictRuleEngine } from '../rules/engine.js';
import { score, sortedMissing } from '../scoring/confidence.js';
import { foldAmendments, sortAmendments } from './fold.js';

export interface ScoringFields {
  critical: readonly string[];
  optional: readonly string[];
}

export interface VersionGraphOptions {
  engine?: ConflictRuleEngine;
  /** Field lists used to rescore the merged lease. */
  leaseFields?: ScoringFields;
  logger?: Logger;
}

interface GroupArena {
  base: Lease;
  amendments: Amendment[];
  snapshot: LeaseGroupSnapshot;
}

// The snapshot shares its base, amendments and nested terms with the arena.
function freezeSnapshot(snapshot: LeaseGroupSnapshot): LeaseGroupSnapshot {
  return deepFreeze(snapshot);
}

export class VersionGraph {
  private readonly groups = new Map<string, GroupArena>();
  private readonly amendmentOwners = new Map<string, string>();
  private readonly conflictOwners = new Map<string, string>();
  private readonly engine: ConflictRuleEngine;
  private readonly leaseFields: ScoringFields | undefined;
  private readonly logger: Logger;

  constructor(options: VersionGraphOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.engine = options.engine ?? new ConflictRuleEngine({ logger: this.logger });
    this.leaseFields = options.leaseFields;
  }

  /**
   * Create a group for an unseen lease, or replace the base record in place.
   */
  addLease(lease: Lease): LeaseGroupSnapshot {
    const base = structuredClone(lease);
    const existing = this.groups.get(base.document_id);
    const amendments = existing ? existing.amendments : [];
    this.logger.debug(existing ? 'Replacing base lease' : 'Creating lease group', {
      lease: base.document_id,
    });
    return this.rebuild(base.document_id, base, amendments, existing?.snapshot);
  }

  /**
   * Insert an amendment into its group and rebuild the group.
   */
  addAmendment(amendment: Amendment): LeaseGroupSnapshot {
    const leaseId = amendment.target_lease_id;
    const arena = this.groups.get(leaseId);
    if (!arena) {
      throw new UnknownLeaseError(
        leaseId,
        `Amendment ${amendment.amendment_id} targets unknown lease ${leaseId}`
      );
    }

    const record = structuredClone(amendment);
    const previousOwner = this.amendmentOwners.get(record.amendment_id);
    if (previousOwner !== undefined && previousOwner !== leaseId) {
      this.detachAmendment(previousOwner, record.amendment_id);
    }

    const amendments = sortAmendments([
      ...arena.amendments.filter((a) => a.amendment_id !== record.amendment_id),
      record,
    ]);
    this.amendmentOwners.set(record.amendment_id, leaseId);
    return this.rebuild(leaseId, arena.base, amendments, arena.snapshot);
  }

  hasLease(leaseId: string): boolean {
    return this.groups.has(leaseId);
  }

  leaseIds(): string[] {
    return Array.from(this.groups.keys()).sort();
  }

  group(leaseId: string): LeaseGroupSnapshot {
    const arena = this.groups.get(leaseId);
    if (!arena) throw new UnknownLeaseError(leaseId);
    return arena.snapshot;
  }

  currentState(leaseId: string): Lease {
    return this.group(leaseId).lease;
  }

  history(leaseId: string): readonly Amendment[] {
    return this.group(leaseId).amendments;
  }

  conflicts(leaseId: string, status?: ConflictStatus): ConflictRecord[] {
    const { conflicts } = this.group(leaseId);
    return status ? conflicts.filter((c) => c.status === status) : [...conflicts];
  }

  leaseIdForConflict(conflictId: string): string {
    const leaseId = this.conflictOwners.get(conflictId);
    if (leaseId === undefined) throw new UnknownConflictError(conflictId);
    return leaseId;
  }

  findConflict(conflictId: string): ConflictRecord {
    const leaseId = this.leaseIdForConflict(conflictId);
    const conflict = this.group(leaseId).conflicts.find((c) => c.id === conflictId);
    if (!conflict) throw new UnknownConflictError(conflictId);
    return conflict;
  }

  /**
   * Apply a resolution decision. Invalid transitions throw before anything changes.
   */
  transition(conflictId: string, decision: Decision, note?: string): ConflictRecord {
    const leaseId = this.leaseIdForConflict(conflictId);
    const arena = this.groups.get(leaseId);
    if (!arena) throw new UnknownLeaseError(leaseId);

    const current = this.findConflict(conflictId);
    const updated = this.engine.policy.applyTransition(current, decision, note);
    if (updated === current) return current;

    const conflicts = arena.snapshot.conflicts.map((c) => (c.id === conflictId ? updated : c));
    arena.snapshot = freezeSnapshot({ ...arena.snapshot, conflicts });
    this.logger.info(`Conflict ${updated.status}`, { lease: leaseId, conflict: conflictId });
    return updated;
  }

  private detachAmendment(leaseId: string, amendmentId: string): void {
    const arena = this.groups.get(leaseId);
    if (!arena) return;
    const amendments = arena.amendments.filter((a) => a.amendment_id !== amendmentId);
    this.rebuild(leaseId, arena.base, amendments, arena.snapshot);
  }

  private mergeLease(base: Lease, amendments: readonly Amendment[]): Lease {
    const terms = foldAmendments(base, amendments);
    if (!this.leaseFields || amendments.length === 0) {
      return { ...base, ...terms, missing: [...base.missing] };
    }
    const merged = { ...base, ...terms };
    // Fields the extraction reported missing stay missing until something supplies them.
    const rescored = score(merged, this.leaseFields.critical, this.leaseFields.optional, base.missing);
    return { ...merged, confidence: rescored.confidence, missing: sortedMissing(rescored.missing) };
  }

  private rebuild(
    leaseId: string,
    base: Lease,
    amendments: Amendment[],
    previous: LeaseGroupSnapshot | undefined
  ): LeaseGroupSnapshot {
    const lease = this.mergeLease(base, amendments);
    const conflicts = this.engine.rescan(
      { lease_id: leaseId, base, amendments },
      previous?.conflicts ?? []
    );
    const suspect = new Set(
      conflicts
        .filter((c) => c.category === 'date_sequence' && c.field === 'effective_date')
        .map((c) => c.source_b.document_id)
    );

    const snapshot = freezeSnapshot({
      lease_id: leaseId,
      base,
      lease,
      amendments: [...amendments],
      conflicts,
      suspect_amendment_ids: Array.from(suspect).sort(),
    });

    for (const conflict of previous?.conflicts ?? []) {
      this.conflictOwners.delete(conflict.id);
    }
    for (const conflict of conflicts) {
      this.conflictOwners.set(conflict.id, leaseId);
    }
    this.groups.set(leaseId, { base, amendments, snapshot });

    if (suspect.size > 0) {
      this.logger.warn('Amendments take effect before commencement', {
        lease: leaseId,
        amendments: Array.from(suspect).sort().join(','),
      });
    }
    return snapshot;
  }
}
