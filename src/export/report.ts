/**
 * Conflict report export - renders a lease group for reviewers.
 */

import {
  SEVERITY_ORDER,
  type ConflictCategory,
  type ConflictRecord,
  type ConflictSource,
  type LeaseGroupSnapshot,
  type Severity,
} from '../core/types.js';

export type ReportFormat = 'markdown' | 'json';

export const REPORT_FORMATS: readonly ReportFormat[] = ['markdown', 'json'];

export interface ReportOptions {
  format: ReportFormat;
  title?: string;
}

export interface ConflictSummary {
  total: number;
  open: number;
  by_severity: Record<Severity, number>;
  by_category: Partial<Record<ConflictCategory, number>>;
}

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

/**
 * Count conflicts by status, severity and category.
 */
export function summarizeConflicts(conflicts: readonly ConflictRecord[]): ConflictSummary {
  const summary: ConflictSummary = {
    total: conflicts.length,
    open: 0,
    by_severity: { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0 },
    by_category: {},
  };

  for (const conflict of conflicts) {
    if (conflict.status === 'open') summary.open++;
    summary.by_severity[conflict.severity]++;
    summary.by_category[conflict.category] = (summary.by_category[conflict.category] ?? 0) + 1;
  }

  return summary;
}

function formatValue(value: ConflictSource['value']): string {
  if (value === null) return '(none)';
  return typeof value === 'number' ? String(value) : `"${value}"`;
}

function formatSource(source: ConflictSource): string {
  const date = source.effective_date ?? 'undated';
  return `${source.document_id} (${date}, confidence ${source.confidence.toFixed(2)}): ${formatValue(source.value)}`;
}

function formatTerm(value: string | number | null): string {
  return value === null ? '-' : String(value);
}

function renderMarkdown(snapshot: LeaseGroupSnapshot, options: ReportOptions): string {
  const { lease, amendments, conflicts } = snapshot;
  const summary = summarizeConflicts(conflicts);
  const lines: string[] = [];

  lines.push(`# ${options.title || `Lease ${snapshot.lease_id}`}`);
  lines.push('');
  lines.push(
    `**${summary.open} open of ${summary.total} conflict(s)** across ${amendments.length} amendment(s)`
  );
  lines.push('');

  lines.push('## Current Terms');
  lines.push('');
  lines.push('| Term | Value |');
  lines.push('|------|-------|');
  lines.push(`| Tenant | ${formatTerm(lease.tenant)} |`);
  lines.push(`| Landlord | ${formatTerm(lease.landlord)} |`);
  lines.push(`| Property | ${formatTerm(lease.property_address)} |`);
  lines.push(`| Commencement | ${formatTerm(lease.commencement_date)} |`);
  lines.push(`| Expiration | ${formatTerm(lease.expiration_date)} |`);
  lines.push(`| Monthly rent | ${formatTerm(lease.base_rent_monthly)} |`);
  lines.push(`| Rentable sq ft | ${formatTerm(lease.rentable_square_feet)} |`);
  lines.push(`| Confidence | ${lease.confidence.toFixed(2)} |`);
  lines.push('');

  if (lease.missing.length > 0) {
    lines.push(`Missing: ${lease.missing.join(', ')}`);
    lines.push('');
  }

  if (amendments.length > 0) {
    lines.push('## Amendment Chain');
    lines.push('');
    for (const amendment of amendments) {
      const suspect = snapshot.suspect_amendment_ids.includes(amendment.amendment_id)
        ? ' (suspect)'
        : '';
      lines.push(
        `- ${amendment.amendment_id}: effective ${amendment.effective_date ?? 'undated'}${suspect}`
      );
    }
    lines.push('');
  }

  lines.push('## Conflicts');
  lines.push('');
  if (conflicts.length === 0) {
    lines.push('No conflicts detected.');
    lines.push('');
  }

  for (const severity of SEVERITY_ORDER) {
    const group = conflicts.filter((c) => c.severity === severity);
    if (group.length === 0) continue;

    lines.push(`### ${severity} (${group.length})`);
    lines.push('');
    for (const conflict of group) {
      lines.push(`#### ${conflict.id} [${conflict.status}]`);
      lines.push('');
      lines.push(`${conflict.category} on \`${conflict.field}\`: ${conflict.description}`);
      lines.push('');
      lines.push(`- A: ${formatSource(conflict.source_a)}`);
      lines.push(`- B: ${formatSource(conflict.source_b)}`);
      lines.push(`- Suggested: ${conflict.suggested_resolution}`);
      if (conflict.note) {
        lines.push(`- Note: ${conflict.note}`);
      }
      lines.push('');
    }
  }

  return lines.join('\n');
}

/**
 * Export a lease group's conflicts as markdown or JSON.
 */
export function exportConflictReport(
  snapshot: LeaseGroupSnapshot,
  options: ReportOptions
): string {
  if (options.format === 'json') {
    return JSON.stringify(
      {
        lease_id: snapshot.lease_id,
        lease: snapshot.lease,
        amendments: snapshot.amendments.map((a) => a.amendment_id),
        suspect_amendment_ids: snapshot.suspect_amendment_ids,
        summary: summarizeConflicts(snapshot.conflicts),
        conflicts: snapshot.conflicts,
      },
      null,
      2
    );
  }
  return renderMarkdown(snapshot, options);
}
