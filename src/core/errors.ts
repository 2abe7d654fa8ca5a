/**
 * Error taxonomy for the reconciliation engine.
 */

import type { ConflictStatus, Decision } from './types.js';

export type ErrorCode =
  | 'CONFIGURATION'
  | 'UNKNOWN_LEASE'
  | 'UNKNOWN_CONFLICT'
  | 'INVALID_TRANSITION';

/**
 * Base class for every error the engine raises on purpose.
 */
export class LeaseGraphError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed rule or field setup. Fatal, never retried.
 */
export class ConfigurationError extends LeaseGraphError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}

/**
 * An amendment (or a read) referenced a lease the graph has never seen.
 */
export class UnknownLeaseError extends LeaseGraphError {
  readonly leaseId: string;

  constructor(leaseId: string, message = `Unknown lease: ${leaseId}`) {
    super('UNKNOWN_LEASE', message);
    this.leaseId = leaseId;
  }
}

export class UnknownConflictError extends LeaseGraphError {
  readonly conflictId: string;

  constructor(conflictId: string) {
    super('UNKNOWN_CONFLICT', `Unknown conflict: ${conflictId}`);
    this.conflictId = conflictId;
  }
}

/**
 * Illegal conflict status change. Raised before any state is touched.
 */
export class InvalidTransitionError extends LeaseGraphError {
  readonly from: ConflictStatus;
  readonly decision: Decision;

  constructor(conflictId: string, from: ConflictStatus, decision: Decision) {
    super(
      'INVALID_TRANSITION',
      `Cannot ${decision} conflict ${conflictId}: status is already ${from}`
    );
    this.from = from;
    this.decision = decision;
  }
}
