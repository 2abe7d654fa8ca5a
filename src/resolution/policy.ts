/**
 * Suggested resolutions and the conflict status lifecycle.
 */

import { InvalidTransitionError } from '../core/errors.js';
import { compareDates } from '../core/values.js';
import type {
  ConflictRecord,
  ConflictSource,
  ConflictStatus,
  Decision,
  Resolution,
} from '../core/types.js';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

export interface ResolutionPolicyOptions {
  confidenceThreshold?: number;
}

const TARGET_STATUS: Record<Decision, ConflictStatus> = {
  resolve: 'resolved',
  ignore: 'ignored',
};

/**
 * Order two sources by effective date; null when either date is missing or malformed.
 */
function effectiveOrder(a: ConflictSource, b: ConflictSource): number | null {
  if (a.effective_date === null || b.effective_date === null) return null;
  try {
    return compareDates(a.effective_date, b.effective_date);
  } catch {
    return null;
  }
}

export class ResolutionPolicy {
  readonly confidenceThreshold: number;

  constructor(options: ResolutionPolicyOptions = {}) {
    this.confidenceThreshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
  }

  /**
   * Prefer the later-effective document unless it is not confident enough.
   * Same or unknown dates fall back to the more confident side.
   */
  suggest(conflict: Pick<ConflictRecord, 'source_a' | 'source_b'>): Resolution {
    const { source_a: a, source_b: b } = conflict;

    const order = effectiveOrder(a, b);
    if (order !== null && order !== 0) {
      const later = order > 0 ? a : b;
      return later.confidence < this.confidenceThreshold
        ? 'manual_review'
        : 'use_later_effective_date';
    }

    if (a.confidence === b.confidence) return 'manual_review';
    const stronger = a.confidence > b.confidence ? a : b;
    return stronger.confidence >= this.confidenceThreshold
      ? 'use_higher_confidence'
      : 'manual_review';
  }

  /**
   * Move an open conflict to resolved or ignored. Repeating the transition a
   * conflict already went through returns it unchanged.
   */
  applyTransition(conflict: ConflictRecord, decision: Decision, note?: string): ConflictRecord {
    const target = TARGET_STATUS[decision];
    if (conflict.status === target) return conflict;
    if (conflict.status !== 'open') {
      throw new InvalidTransitionError(conflict.id, conflict.status, decision);
    }
    return note === undefined
      ? { ...conflict, status: target }
      : { ...conflict, status: target, note };
  }
}
