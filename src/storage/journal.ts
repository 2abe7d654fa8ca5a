/**
 * Append-only ingestion journal under `.leasegraph/journal/`.
 *
 * The engine keeps its state in memory; the CLI rebuilds it on every run by
 * replaying the journal in sequence order. Each entry is one YAML file named
 * `<sequence>-<slug>.yaml`.
 */

import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { basename, join } from 'path';
import { z } from 'zod';
import { CONFIG_FILE } from '../config/config.js';
import { InvalidTransitionError, UnknownConflictError } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type { IngestionCoordinator } from '../ingest/coordinator.js';
import { ingestRequestSchema, type IngestRequest } from '../ingest/schema.js';
import { WORKSPACE_DIR, listYamlFiles, loadYaml, saveYaml } from './files.js';

export const JOURNAL_DIR = 'journal';

const SEQUENCE_WIDTH = 6;

export const documentEntrySchema = z.object({
  kind: z.literal('document'),
  sequence: z.number().int().positive(),
  recorded_at: z.string(),
  request: ingestRequestSchema,
});

export const decisionEntrySchema = z.object({
  kind: z.literal('decision'),
  sequence: z.number().int().positive(),
  recorded_at: z.string(),
  conflict_id: z.string().min(1),
  decision: z.enum(['resolve', 'ignore']),
  note: z.string().optional(),
});

export const journalEntrySchema = z.discriminatedUnion('kind', [
  documentEntrySchema,
  decisionEntrySchema,
]);

export type JournalEntry = z.infer<typeof journalEntrySchema>;
export type DocumentEntry = z.infer<typeof documentEntrySchema>;
export type DecisionEntry = z.infer<typeof decisionEntrySchema>;

/**
 * What a caller appends; the journal assigns `sequence` and `recorded_at`.
 */
export type NewJournalEntry =
  | { kind: 'document'; request: z.input<typeof ingestRequestSchema> }
  | { kind: 'decision'; conflict_id: string; decision: 'resolve' | 'ignore'; note?: string };

export interface ReplaySummary {
  documents: number;
  decisions: number;
  skipped: number;
}

export function journalDir(workspaceRoot: string): string {
  return join(workspaceRoot, WORKSPACE_DIR, JOURNAL_DIR);
}

/**
 * Create the workspace directory, its journal and a default config file.
 * Existing files are left alone unless `force` is set.
 */
export function initWorkspace(workspaceRoot: string, force = false): string {
  const dir = join(workspaceRoot, WORKSPACE_DIR);
  mkdirSync(journalDir(workspaceRoot), { recursive: true });

  const configPath = join(dir, CONFIG_FILE);
  if (force || !existsSync(configPath)) {
    const lines = [
      '# leasegraph configuration; every key is optional',
      'log_level: info',
      'resolution:',
      '  confidence_threshold: 0.7',
      'tolerances:',
      '  square_feet: 1',
      '  calculation: 0.01',
      '',
    ];
    writeFileSync(configPath, lines.join('\n'), 'utf-8');
  }
  return dir;
}

/**
 * Pin a request to the time it was first ingested, so replays reproduce it.
 */
export function stampIngestedAt(request: IngestRequest, ingestedAt: string): IngestRequest {
  if (request.document.ingested_at !== undefined) return request;
  return { ...request, document: { ...request.document, ingested_at: ingestedAt } };
}

export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug.length > 0 ? slug.slice(0, 48) : 'entry';
}

function sequenceOf(filePath: string): number {
  const match = /^(\d+)-/.exec(basename(filePath));
  return match ? Number(match[1]) : 0;
}

/**
 * Append one entry. Returns the path of the file written.
 */
export function appendEntry(
  workspaceRoot: string,
  entry: NewJournalEntry,
  now: Date = new Date()
): string {
  const dir = journalDir(workspaceRoot);
  const last = listYamlFiles(dir).reduce((max, file) => Math.max(max, sequenceOf(file)), 0);
  const sequence = last + 1;
  const slug = slugify(entry.kind === 'document' ? entry.request.document.id : entry.conflict_id);
  const filePath = join(dir, `${String(sequence).padStart(SEQUENCE_WIDTH, '0')}-${slug}.yaml`);

  saveYaml(filePath, { ...entry, sequence, recorded_at: now.toISOString() });
  return filePath;
}

/**
 * Load every valid entry, ordered by sequence. Invalid files are logged and skipped.
 */
export function loadJournal(workspaceRoot: string, logger: Logger = silentLogger): JournalEntry[] {
  const entries: JournalEntry[] = [];
  for (const file of listYamlFiles(journalDir(workspaceRoot))) {
    let raw: unknown;
    try {
      raw = loadYaml(file);
    } catch (err) {
      logger.warn('Skipping unreadable journal entry', {
        file,
        error: err instanceof Error ? err.message : String(err),
      });
      continue;
    }
    const parsed = journalEntrySchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn('Skipping invalid journal entry', { file, issues: parsed.error.issues.length });
      continue;
    }
    entries.push(parsed.data);
  }
  return entries.sort((a, b) => a.sequence - b.sequence);
}

/**
 * Feed journal entries into a coordinator. Decisions that no longer apply
 * (conflict gone, already decided) are logged and counted as skipped.
 */
export async function replayJournal(
  entries: readonly JournalEntry[],
  coordinator: IngestionCoordinator,
  logger: Logger = silentLogger
): Promise<ReplaySummary> {
  const summary: ReplaySummary = { documents: 0, decisions: 0, skipped: 0 };

  for (const entry of entries) {
    if (entry.kind === 'document') {
      await coordinator.submit(entry.request);
      summary.documents++;
      continue;
    }

    try {
      await coordinator.resolve(entry.conflict_id, entry.decision, entry.note);
      summary.decisions++;
    } catch (err) {
      if (err instanceof UnknownConflictError || err instanceof InvalidTransitionError) {
        logger.warn('Skipping stale decision', { sequence: entry.sequence, error: err.message });
        summary.skipped++;
        continue;
      }
      throw err;
    }
  }

  return summary;
}
