/**
 * Completeness-based confidence scoring.
 *
 * The score is recomputed from the final structured record on every ingestion;
 * whatever confidence the extraction oracle reported about itself is ignored.
 */

import { ConfigurationError } from '../core/errors.js';

export interface ScoreResult {
  confidence: number;
  missing: Set<string>;
}

const OPTIONAL_BONUS_PER_FIELD = 0.05;
const OPTIONAL_BONUS_CAP = 0.2;

/**
 * A field counts as populated when it holds anything but null, undefined or ''.
 */
export function isPopulated(value: unknown): boolean {
  return value !== null && value !== undefined && value !== '';
}

/**
 * Score a record against its critical and optional field lists.
 *
 * `seedMissing` lists fields the extraction oracle could not find; those still
 * absent from the record are added to the computed critical-missing set.
 */
export function score(
  record: object,
  criticalFields: readonly string[],
  optionalFields: readonly string[],
  seedMissing: readonly string[] = []
): ScoreResult {
  if (criticalFields.length === 0) {
    throw new ConfigurationError('Cannot score a record without critical fields');
  }

  const values = new Map<string, unknown>(Object.entries(record));
  const missing = new Set<string>();

  let populated = 0;
  for (const field of criticalFields) {
    if (isPopulated(values.get(field))) {
      populated++;
    } else {
      missing.add(field);
    }
  }

  let optionalPopulated = 0;
  for (const field of optionalFields) {
    if (isPopulated(values.get(field))) optionalPopulated++;
  }

  for (const field of seedMissing) {
    if (!isPopulated(values.get(field))) missing.add(field);
  }

  const base = populated / criticalFields.length;
  const bonus = Math.min(OPTIONAL_BONUS_CAP, OPTIONAL_BONUS_PER_FIELD * optionalPopulated);
  const confidence = Math.max(0, Math.min(1, base + bonus));

  return { confidence, missing };
}

export function sortedMissing(missing: Set<string>): string[] {
  return Array.from(missing).sort();
}
