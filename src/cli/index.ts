#!/usr/bin/env node
/**
 * leasegraph CLI - ingest oracle results, inspect lease groups and decide conflicts.
 *
 * State lives in the `.leasegraph/journal`; every command replays it first.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config/config.js';
import { LeaseGraphError } from '../core/errors.js';
import { createConsoleLogger, isLogLevel, type Logger } from '../core/logger.js';
import type { ConflictRecord, ConflictStatus, Decision, Severity } from '../core/types.js';
import { exportConflictReport, isReportFormat, REPORT_FORMATS } from '../export/report.js';
import { IngestionCoordinator } from '../ingest/coordinator.js';
import { ingestRequestSchema } from '../ingest/schema.js';
import { findWorkspaceRoot, loadYaml } from '../storage/files.js';
import {
  appendEntry,
  initWorkspace,
  loadJournal,
  replayJournal,
  stampIngestedAt,
} from '../storage/journal.js';

const STATUSES: readonly ConflictStatus[] = ['open', 'resolved', 'ignored'];
const DECISIONS: readonly Decision[] = ['resolve', 'ignore'];

interface Engine {
  root: string;
  coordinator: IngestionCoordinator;
  logger: Logger;
}

function requireRoot(): string {
  const root = findWorkspaceRoot();
  if (!root) {
    console.error(chalk.red('Not in a leasegraph workspace (run `leasegraph init`)'));
    process.exit(1);
  }
  return root;
}

async function openEngine(): Promise<Engine> {
  const root = requireRoot();
  const config = loadConfig(root);
  const envLevel = process.env.LEASEGRAPH_LOG_LEVEL;
  const logger = createConsoleLogger(
    envLevel !== undefined && isLogLevel(envLevel) ? envLevel : config.log_level
  );
  const coordinator = new IngestionCoordinator({ config, logger });
  const summary = await replayJournal(loadJournal(root, logger), coordinator, logger);
  logger.debug('Journal replayed', {
    documents: summary.documents,
    decisions: summary.decisions,
    skipped: summary.skipped,
  });
  return { root, coordinator, logger };
}

/**
 * Wrap an action so engine errors print in red and exit 1.
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      if (err instanceof LeaseGraphError) {
        console.error(chalk.red(`${err.code}: ${err.message}`));
      } else {
        console.error(chalk.red(err instanceof Error ? err.message : String(err)));
      }
      process.exit(1);
    }
  };
}

function severityColor(severity: Severity): (text: string) => string {
  switch (severity) {
    case 'CRITICAL':
      return chalk.red;
    case 'HIGH':
      return chalk.yellow;
    case 'MEDIUM':
      return chalk.cyan;
    default:
      return chalk.gray;
  }
}

function printConflict(conflict: ConflictRecord): void {
  const paint = severityColor(conflict.severity);
  console.log(
    `${chalk.cyan(conflict.id)} ${paint(`[${conflict.severity}]`)} ${conflict.category} ${chalk.gray(conflict.status)}`
  );
  console.log(`  ${conflict.description}`);
  console.log(chalk.gray(`  suggested: ${conflict.suggested_resolution}`));
}

const program = new Command();

program
  .name('leasegraph')
  .description('Amendment-aware lease reconciliation and conflict detection')
  .version('0.1.0');

// Init command
program
  .command('init')
  .description('Initialize a leasegraph workspace in the current directory')
  .option('-f, --force', 'Overwrite an existing config file')
  .action((options: { force?: boolean }) => {
    const dir = initWorkspace(process.cwd(), options.force ?? false);
    console.log(chalk.green(`Initialized workspace: ${dir}`));
  });

// Ingest command
program
  .command('ingest <file>')
  .description('Ingest a classified and extracted document (YAML or JSON)')
  .action(
    run(async (file: string) => {
      const { root, coordinator } = await openEngine();
      const parsed = ingestRequestSchema.safeParse(loadYaml(file));
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          console.error(chalk.red(`${issue.path.join('.') || '(root)'}: ${issue.message}`));
        }
        process.exit(1);
      }

      const receipt = await coordinator.submit(parsed.data);
      if (receipt.outcome === 'duplicate') {
        console.log(chalk.gray(`Already ingested: ${receipt.document.id}`));
        return;
      }

      const path = appendEntry(root, {
        kind: 'document',
        request: stampIngestedAt(parsed.data, receipt.document.ingested_at),
      });
      if (receipt.outcome === 'parked') {
        console.log(
          chalk.yellow(
            `Parked ${receipt.document.id}: lease ${receipt.lease_id ?? '?'} has not been ingested yet`
          )
        );
      } else {
        console.log(chalk.green(`Ingested ${receipt.document.id} (${receipt.outcome})`));
      }
      console.log(chalk.gray(`Journal: ${path}`));

      for (const conflict of receipt.conflicts) {
        printConflict(conflict);
      }
    })
  );

// Show command
program
  .command('show <leaseId>')
  .description('Show the merged current state of a lease')
  .option('--json', 'Print the record as JSON')
  .action(
    run(async (leaseId: string, options: { json?: boolean }) => {
      const { coordinator } = await openEngine();
      const lease = coordinator.currentState(leaseId);
      if (options.json) {
        console.log(JSON.stringify(lease, null, 2));
        return;
      }

      console.log(chalk.cyan(lease.document_id));
      console.log(chalk.bold(`${lease.tenant ?? '?'} / ${lease.landlord ?? '?'}`));
      console.log(`${lease.property_address ?? '(no address)'}`);
      console.log(`Term: ${lease.commencement_date ?? '?'} to ${lease.expiration_date ?? '?'}`);
      console.log(`Monthly rent: ${lease.base_rent_monthly ?? '?'}`);
      console.log(
        chalk.gray(`Confidence: ${lease.confidence.toFixed(2)} | Missing: ${lease.missing.join(', ') || 'none'}`)
      );
    })
  );

// History command
program
  .command('history <leaseId>')
  .description('List the amendment chain of a lease in effective order')
  .action(
    run(async (leaseId: string) => {
      const { coordinator } = await openEngine();
      const chain = coordinator.history(leaseId);
      if (chain.length === 0) {
        console.log(chalk.gray('No amendments'));
        return;
      }
      for (const amendment of chain) {
        const fields = Object.keys(amendment.changes).join(', ') || 'no changes';
        console.log(
          `${chalk.cyan(amendment.amendment_id)} ${amendment.effective_date ?? 'undated'} ${chalk.gray(fields)}`
        );
      }
    })
  );

// Conflicts command
program
  .command('conflicts <leaseId>')
  .description('List conflicts of a lease')
  .option('-s, --status <status>', 'Filter by status (open, resolved, ignored)')
  .action(
    run(async (leaseId: string, options: { status?: string }) => {
      const status = STATUSES.find((s) => s === options.status);
      if (options.status !== undefined && status === undefined) {
        console.error(chalk.red(`Invalid status: ${options.status}. Must be one of: ${STATUSES.join(', ')}`));
        process.exit(1);
      }

      const { coordinator } = await openEngine();
      const conflicts = coordinator.listConflicts(leaseId, status);
      if (conflicts.length === 0) {
        console.log(chalk.green('No conflicts'));
        return;
      }
      for (const conflict of conflicts) {
        printConflict(conflict);
      }
    })
  );

// Resolve command
program
  .command('resolve <conflictId>')
  .description('Resolve or ignore a conflict')
  .requiredOption('-d, --decision <decision>', 'Decision (resolve, ignore)')
  .option('-n, --note <note>', 'Reviewer note')
  .action(
    run(async (conflictId: string, options: { decision: string; note?: string }) => {
      const decision = DECISIONS.find((d) => d === options.decision);
      if (decision === undefined) {
        console.error(chalk.red(`Invalid decision: ${options.decision}. Must be resolve or ignore`));
        process.exit(1);
      }

      const { root, coordinator } = await openEngine();
      const before = coordinator.graph.findConflict(conflictId);
      const updated = await coordinator.resolve(conflictId, decision, options.note);
      if (updated === before) {
        console.log(chalk.gray(`Conflict ${conflictId} is already ${updated.status}`));
        return;
      }

      appendEntry(root, { kind: 'decision', conflict_id: conflictId, decision, note: options.note });
      console.log(chalk.green(`Conflict ${conflictId} ${updated.status}`));
    })
  );

// Report command
program
  .command('report <leaseId>')
  .description('Export a conflict report for a lease')
  .option('-f, --format <format>', `Report format (${REPORT_FORMATS.join(', ')})`, 'markdown')
  .option('-t, --title <title>', 'Document title')
  .action(
    run(async (leaseId: string, options: { format: string; title?: string }) => {
      if (!isReportFormat(options.format)) {
        console.error(chalk.red(`Unknown format: ${options.format}`));
        process.exit(1);
      }

      const { coordinator } = await openEngine();
      const output = exportConflictReport(coordinator.group(leaseId), {
        format: options.format,
        title: options.title,
      });
      console.log(output);
    })
  );

await program.parseAsync();
