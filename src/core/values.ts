/**
 * Value helpers shared by the rules: dates, money, names, addresses, hashing.
 */

import { createHash } from 'crypto';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Validate an ISO calendar date (YYYY-MM-DD). Throws on anything else.
 */
export function parseIsoDate(value: string): string {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new Error(`Malformed date: ${value}`);
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    throw new Error(`Malformed date: ${value}`);
  }
  return value;
}

/**
 * Compare two ISO dates. Negative when `a` is earlier.
 */
export function compareDates(a: string, b: string): number {
  const left = parseIsoDate(a);
  const right = parseIsoDate(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Convert a money amount to integer cents. Throws on non-finite input.
 */
export function toCents(amount: number): number {
  if (!Number.isFinite(amount)) {
    throw new Error(`Malformed amount: ${amount}`);
  }
  return Math.round(amount * 100);
}

export function sameToTheCent(a: number, b: number): boolean {
  return toCents(a) === toCents(b);
}

const ENTITY_SUFFIXES = new Set([
  'llc',
  'inc',
  'corp',
  'co',
  'ltd',
  'lp',
  'llp',
  'pllc',
  'corporation',
  'incorporated',
  'company',
  'limited',
]);

function words(value: string): string[] {
  return value
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0);
}

/**
 * Normalize a party name: case, punctuation and trailing legal-entity suffixes.
 */
export function normalizePartyName(name: string): string {
  const parts = words(name.replace(/\./g, ''));
  while (parts.length > 1 && ENTITY_SUFFIXES.has(parts[parts.length - 1])) {
    parts.pop();
  }
  return parts.join(' ');
}

const STREET_ABBREVIATIONS: Record<string, string> = {
  street: 'st',
  avenue: 'ave',
  boulevard: 'blvd',
  road: 'rd',
  drive: 'dr',
  lane: 'ln',
  court: 'ct',
  place: 'pl',
  parkway: 'pkwy',
  highway: 'hwy',
  suite: 'ste',
  north: 'n',
  south: 's',
  east: 'e',
  west: 'w',
};

/**
 * Normalize a street address for comparison.
 */
export function normalizeAddress(address: string): string {
  return words(address.replace(/\./g, ''))
    .map((word) => STREET_ABBREVIATIONS[word] ?? word)
    .join(' ');
}

export function sha256(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Key-sorted JSON, so equal values always hash the same.
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value));
}

function normalize(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (Array.isArray(value)) return value.map(normalize);
  if (typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (entry === undefined) continue;
      out[key] = normalize(entry);
    }
    return out;
  }
  return value;
}

export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a == null || b == null) return false;
  return stableStringify(a) === stableStringify(b);
}

/**
 * Freeze a plain record and everything reachable from it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null) return value;
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}
