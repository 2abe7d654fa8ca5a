/**
 * Conflict rule engine: runs the rule battery over a lease group and
 * reconciles the result with the group's previous conflict set.
 */

import { silentLogger, type Logger } from '../core/logger.js';
import {
  SEVERITY_BY_CATEGORY,
  SEVERITY_ORDER,
  type ConflictRecord,
  type ConflictSource,
  type ConflictValue,
} from '../core/types.js';
import { sha256, valuesEqual } from '../core/values.js';
import { walkChain } from '../graph/fold.js';
import { ResolutionPolicy } from '../resolution/policy.js';
import { compareDatesRule } from './dates.js';
import { compareRentRule } from './rent.js';
import { comparePartiesRule } from './parties.js';
import { comparePropertyRule } from './property.js';
import { checkSupersededRule } from './superseded.js';
import { validateCalculationsRule } from './calculations.js';
import type { ConflictFinding, ConflictRule, GroupInput, RuleContext, Tolerances } from './types.js';

export const DEFAULT_RULES: readonly ConflictRule[] = [
  compareDatesRule,
  compareRentRule,
  comparePartiesRule,
  comparePropertyRule,
  checkSupersededRule,
  validateCalculationsRule,
];

export const DEFAULT_TOLERANCES: Tolerances = {
  square_feet: 1,
  calculation: 0.01,
};

export interface ConflictRuleEngineOptions {
  policy?: ResolutionPolicy;
  rules?: readonly ConflictRule[];
  tolerances?: Tolerances;
  logger?: Logger;
}

/**
 * Deterministic id, so rescans and replays find the same record again.
 */
export function conflictId(leaseId: string, finding: ConflictFinding): string {
  const key = [
    leaseId,
    finding.category,
    finding.field,
    finding.source_a.document_id,
    finding.source_b.document_id,
  ].join('|');
  return `cf-${sha256(key).slice(0, 16)}`;
}

function sameFacts(a: ConflictRecord, b: ConflictRecord): boolean {
  return valuesEqual(a.source_a.value, b.source_a.value) && valuesEqual(a.source_b.value, b.source_b.value);
}

function byPriority(a: ConflictRecord, b: ConflictRecord): number {
  const severity = SEVERITY_ORDER.indexOf(a.severity) - SEVERITY_ORDER.indexOf(b.severity);
  if (severity !== 0) return severity;
  if (a.category !== b.category) return a.category < b.category ? -1 : 1;
  if (a.field !== b.field) return a.field < b.field ? -1 : 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Failed extractions take no part in comparisons, whatever their score.
 */
export function isComparable(record: { extraction_failed: boolean }): boolean {
  return !record.extraction_failed;
}

export class ConflictRuleEngine {
  readonly policy: ResolutionPolicy;
  private readonly rules: readonly ConflictRule[];
  private readonly tolerances: Tolerances;
  private readonly logger: Logger;

  constructor(options: ConflictRuleEngineOptions = {}) {
    this.policy = options.policy ?? new ResolutionPolicy();
    this.rules = options.rules ?? DEFAULT_RULES;
    this.tolerances = options.tolerances ?? DEFAULT_TOLERANCES;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run every rule over the group and return open conflict records.
   */
  scan(group: GroupInput): ConflictRecord[] {
    const { lease_id: leaseId, base } = group;
    if (!isComparable(base)) {
      this.logger.debug('Skipping scan of lease without extracted terms', { lease: leaseId });
      return [];
    }

    const comparable = group.amendments.filter(isComparable);
    const chain = walkChain(base, comparable);
    const documents = new Map<string, { effective_date: string | null; confidence: number }>();
    documents.set(base.document_id, {
      effective_date: base.commencement_date,
      confidence: base.confidence,
    });
    for (const amendment of comparable) {
      documents.set(amendment.amendment_id, {
        effective_date: amendment.effective_date,
        confidence: amendment.confidence,
      });
    }

    const records = new Map<string, ConflictRecord>();
    let currentRule = '';

    const context: RuleContext = {
      leaseId,
      base,
      chain,
      tolerances: this.tolerances,
      source: (documentId: string, value: ConflictValue): ConflictSource => {
        const document = documents.get(documentId);
        return {
          document_id: documentId,
          value,
          effective_date: document?.effective_date ?? null,
          confidence: document?.confidence ?? 0,
        };
      },
      check: (label, comparison) => {
        try {
          comparison();
        } catch (err) {
          this.logger.warn(`Rule ${currentRule} skipped ${label}`, {
            lease: leaseId,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      },
      report: (finding) => {
        const id = conflictId(leaseId, finding);
        if (records.has(id)) return;
        records.set(id, {
          id,
          lease_id: leaseId,
          category: finding.category,
          severity: SEVERITY_BY_CATEGORY[finding.category],
          field: finding.field,
          source_a: finding.source_a,
          source_b: finding.source_b,
          description: finding.description,
          suggested_resolution: this.policy.suggest(finding),
          status: 'open',
        });
      },
    };

    for (const rule of this.rules) {
      currentRule = rule.name;
      try {
        rule.evaluate(context);
      } catch (err) {
        this.logger.error(`Rule ${rule.name} failed`, {
          lease: leaseId,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return Array.from(records.values()).sort(byPriority);
  }

  /**
   * Replace the group's open conflicts with a fresh scan. Resolved and ignored
   * records survive unless the values they were decided on changed, in which
   * case they reopen.
   */
  rescan(group: GroupInput, previous: readonly ConflictRecord[]): ConflictRecord[] {
    const scanned = this.scan(group);
    const previousById = new Map(previous.map((record) => [record.id, record]));
    const result: ConflictRecord[] = [];

    for (const fresh of scanned) {
      const earlier = previousById.get(fresh.id);
      previousById.delete(fresh.id);
      if (!earlier || earlier.status === 'open') {
        result.push(fresh);
      } else if (sameFacts(earlier, fresh)) {
        result.push(earlier);
      } else {
        this.logger.info('Reopening conflict after its facts changed', {
          lease: group.lease_id,
          conflict: fresh.id,
          was: earlier.status,
        });
        result.push(fresh);
      }
    }

    for (const earlier of previousById.values()) {
      if (earlier.status !== 'open') result.push(earlier);
    }

    return result.sort(byPriority);
  }
}
