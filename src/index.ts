/**
 * leasegraph - amendment-aware lease reconciliation and conflict detection
 *
 * @packageDocumentation
 */

export type {
  Amendment,
  ChangeSet,
  ConflictCategory,
  ConflictRecord,
  ConflictSource,
  ConflictStatus,
  Decision,
  DocumentType,
  FieldChange,
  Lease,
  LeaseDocument,
  LeaseField,
  LeaseGroupSnapshot,
  LeaseTerms,
  Resolution,
  Severity,
} from './core/types.js';
export { DOCUMENT_TYPES, LEASE_FIELDS, SEVERITY_BY_CATEGORY } from './core/types.js';
export {
  ConfigurationError,
  InvalidTransitionError,
  LeaseGraphError,
  UnknownConflictError,
  UnknownLeaseError,
} from './core/errors.js';
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from './core/logger.js';
export { DEFAULT_CONFIG, loadConfig, resolveConfig, type EngineConfig } from './config/config.js';
export { score, type ScoreResult } from './scoring/confidence.js';
export { foldAmendments, sortAmendments } from './graph/fold.js';
export { VersionGraph } from './graph/versionGraph.js';
export { ConflictRuleEngine, DEFAULT_RULES } from './rules/engine.js';
export type { ConflictFinding, ConflictRule, RuleContext } from './rules/types.js';
export { ResolutionPolicy } from './resolution/policy.js';
export { KeyedMutex } from './concurrency/keyedMutex.js';
export {
  IngestionCoordinator,
  type IngestOutcome,
  type IngestReceipt,
} from './ingest/coordinator.js';
export type { IngestRequest } from './ingest/schema.js';
export {
  appendEntry,
  initWorkspace,
  loadJournal,
  replayJournal,
  stampIngestedAt,
} from './storage/journal.js';
export { exportConflictReport, summarizeConflicts } from './export/report.js';
