/**
 * Shared shapes for conflict rules.
 */

import type {
  Amendment,
  ConflictCategory,
  ConflictSource,
  ConflictValue,
  Lease,
} from '../core/types.js';
import type { ChainStep } from '../graph/fold.js';

export interface Tolerances {
  /** Absolute tolerance for square footage comparisons. */
  square_feet: number;
  /** Relative tolerance for derived quantities (0.01 = 1%). */
  calculation: number;
}

/**
 * A contradiction found by a rule, before it becomes a ConflictRecord.
 */
export interface ConflictFinding {
  category: ConflictCategory;
  field: string;
  source_a: ConflictSource;
  source_b: ConflictSource;
  description: string;
}

/**
 * What a rule sees: the base record and the comparable part of the chain.
 */
export interface RuleContext {
  leaseId: string;
  base: Lease;
  chain: readonly ChainStep[];
  tolerances: Tolerances;
  /** Evidence for a value claimed by a document of this group. */
  source(documentId: string, value: ConflictValue): ConflictSource;
  /** Run one comparison; a throw is logged and only that comparison is lost. */
  check(label: string, comparison: () => void): void;
  report(finding: ConflictFinding): void;
}

export interface ConflictRule {
  name: string;
  evaluate(context: RuleContext): void;
}

/**
 * Input to a scan: a group's base record and its amendments.
 */
export interface GroupInput {
  lease_id: string;
  base: Lease;
  amendments: readonly Amendment[];
}
