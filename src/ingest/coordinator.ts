/**
 * Ingestion coordinator: takes finished oracle results, scores them, routes
 * them into the version graph and reports the conflicts they opened.
 *
 * Mutations of one lease group are serialized through a keyed mutex; groups
 * never wait on each other.
 */

import { KeyedMutex } from '../concurrency/keyedMutex.js';
import { DEFAULT_CONFIG, type EngineConfig } from '../config/config.js';
import { UnknownLeaseError } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import type {
  Amendment,
  ConflictRecord,
  ConflictStatus,
  Decision,
  DocumentType,
  Lease,
  LeaseDocument,
  LeaseGroupSnapshot,
} from '../core/types.js';
import { deepFreeze, sha256, stableStringify } from '../core/values.js';
import { VersionGraph } from '../graph/versionGraph.js';
import { ResolutionPolicy } from '../resolution/policy.js';
import { ConflictRuleEngine } from '../rules/engine.js';
import { score, sortedMissing } from '../scoring/confidence.js';
import {
  amendmentCandidateSchema,
  ingestRequestSchema,
  leaseCandidateSchema,
  type AmendmentCandidate,
  type IngestRequest,
  type LeaseCandidate,
} from './schema.js';

export type IngestOutcome = 'merged' | 'duplicate' | 'parked' | 'recorded';

export interface IngestReceipt {
  outcome: IngestOutcome;
  document: LeaseDocument;
  lease_id: string | null;
  conflicts: ConflictRecord[];
}

export interface IngestionCoordinatorOptions {
  config?: EngineConfig;
  logger?: Logger;
  /** Clock for `ingested_at` when the request carries none. */
  now?: () => Date;
}

type Route = 'lease' | 'amendment' | 'record';

const ROUTES: Record<DocumentType, Route> = {
  base_lease: 'lease',
  amendment: 'amendment',
  assignment: 'amendment',
  sublease: 'record',
  estoppel: 'record',
  snda: 'record',
  other: 'record',
};

interface PreparedDocument {
  id: string;
  contentHash: string;
  declaredType: DocumentType;
  classificationConfidence: number;
  needsReview: boolean;
  ingestedAt: string;
  leaseCandidate: LeaseCandidate | null;
  amendmentCandidate: AmendmentCandidate | null;
  extractionFailed: boolean;
  notFound: string[];
  leaseHint: string | null;
}

export class IngestionCoordinator {
  readonly graph: VersionGraph;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly mutex = new KeyedMutex();
  private readonly documents = new Map<string, LeaseDocument>();
  private readonly seenHashes = new Map<string, string>();
  private readonly pending = new Map<string, Amendment[]>();
  private sequence = 0;

  constructor(options: IngestionCoordinatorOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());

    const policy = new ResolutionPolicy({
      confidenceThreshold: this.config.resolution.confidence_threshold,
    });
    const engine = new ConflictRuleEngine({
      policy,
      tolerances: this.config.tolerances,
      logger: this.logger,
    });
    this.graph = new VersionGraph({
      engine,
      leaseFields: this.config.scoring.lease,
      logger: this.logger,
    });
  }

  /**
   * Ingest one document and return the conflicts it newly opened in its group.
   */
  async ingest(request: IngestRequest): Promise<ConflictRecord[]> {
    const receipt = await this.submit(request);
    if (receipt.outcome === 'parked' && receipt.lease_id !== null) {
      throw new UnknownLeaseError(
        receipt.lease_id,
        `Amendment ${receipt.document.id} targets unknown lease ${receipt.lease_id}; parked until it arrives`
      );
    }
    return receipt.conflicts;
  }

  /**
   * Ingest one document and return the full receipt. Unlike `ingest`, an
   * amendment for an unknown lease comes back as a `parked` receipt.
   */
  async submit(request: IngestRequest): Promise<IngestReceipt> {
    const prepared = this.prepare(request);
    const route = ROUTES[prepared.declaredType];
    const leaseId =
      route === 'lease'
        ? prepared.id
        : route === 'amendment'
          ? (prepared.amendmentCandidate?.target_lease_id ?? prepared.leaseHint)
          : null;

    return this.mutex.runExclusive(leaseId ?? `document:${prepared.id}`, () =>
      this.accept(prepared, route, leaseId)
    );
  }

  currentState(leaseId: string): Lease {
    return this.graph.currentState(leaseId);
  }

  history(leaseId: string): readonly Amendment[] {
    return this.graph.history(leaseId);
  }

  group(leaseId: string): LeaseGroupSnapshot {
    return this.graph.group(leaseId);
  }

  listConflicts(leaseId: string, status?: ConflictStatus): ConflictRecord[] {
    return this.graph.conflicts(leaseId, status);
  }

  /**
   * Resolve or ignore a conflict, serialized with the other mutations of its group.
   */
  async resolve(conflictId: string, decision: Decision, note?: string): Promise<ConflictRecord> {
    const leaseId = this.graph.leaseIdForConflict(conflictId);
    return this.mutex.runExclusive(leaseId, () => this.graph.transition(conflictId, decision, note));
  }

  documentsList(): LeaseDocument[] {
    return Array.from(this.documents.values()).sort(
      (a, b) => a.ingestion_sequence - b.ingestion_sequence
    );
  }

  pendingAmendments(leaseId: string): readonly Amendment[] {
    return [...(this.pending.get(leaseId) ?? [])];
  }

  private prepare(input: IngestRequest): PreparedDocument {
    const request = ingestRequestSchema.parse(input);
    const { document, classification, extraction } = request;

    let declaredType: DocumentType = 'other';
    let classificationConfidence = 0;
    let needsReview = true;
    if (classification.ok) {
      declaredType = classification.document_type;
      classificationConfidence = classification.confidence;
      needsReview =
        classification.needs_review ??
        classification.confidence < this.config.resolution.confidence_threshold;
    } else {
      this.logger.warn('Classification failed; recording as other', {
        document: document.id,
        error: classification.error,
      });
    }

    const route = ROUTES[declaredType];
    let leaseCandidate: LeaseCandidate | null = null;
    let amendmentCandidate: AmendmentCandidate | null = null;
    let notFound: string[] = [];
    let extractionFailed = !extraction.ok;

    if (extraction.ok) {
      notFound = extraction.not_found;
      const raw = extraction.candidate ?? {};
      let issues = 0;
      if (route === 'amendment') {
        const parsed = amendmentCandidateSchema.safeParse(raw);
        if (parsed.success) amendmentCandidate = parsed.data;
        else issues = parsed.error.issues.length;
      } else {
        const parsed = leaseCandidateSchema.safeParse(raw);
        if (parsed.success) leaseCandidate = parsed.data;
        else issues = parsed.error.issues.length;
      }
      if (issues > 0) {
        extractionFailed = true;
        this.logger.warn('Extracted candidate failed validation; treating as empty', {
          document: document.id,
          issues,
        });
      }
    } else {
      this.logger.warn('Extraction failed; recording an empty record', {
        document: document.id,
        error: extraction.error,
      });
    }

    const contentHash =
      document.content_hash ??
      sha256(
        document.text !== undefined
          ? document.text
          : stableStringify({ id: document.id, type: declaredType, extraction })
      );

    return {
      id: document.id,
      contentHash,
      declaredType,
      classificationConfidence,
      needsReview,
      ingestedAt: document.ingested_at ?? this.now().toISOString(),
      leaseCandidate,
      amendmentCandidate,
      extractionFailed,
      notFound,
      leaseHint: document.lease_id ?? null,
    };
  }

  private accept(prepared: PreparedDocument, route: Route, leaseId: string | null): IngestReceipt {
    const knownId = this.seenHashes.get(prepared.contentHash);
    if (knownId !== undefined) {
      const known = this.documents.get(knownId);
      if (known) {
        const parkedFor = this.parkedLeaseId(known.id);
        if (parkedFor !== null) {
          return { outcome: 'parked', document: known, lease_id: parkedFor, conflicts: [] };
        }
        this.logger.debug('Duplicate content; nothing to do', { document: known.id });
        return { outcome: 'duplicate', document: known, lease_id: leaseId, conflicts: [] };
      }
    }

    const document: LeaseDocument = Object.freeze({
      id: prepared.id,
      declared_type: prepared.declaredType,
      classification_confidence: prepared.classificationConfidence,
      ingested_at: prepared.ingestedAt,
      content_hash: prepared.contentHash,
      ingestion_sequence: ++this.sequence,
      needs_review: prepared.needsReview,
    });
    this.documents.set(document.id, document);
    this.seenHashes.set(document.content_hash, document.id);

    if (route === 'record' || leaseId === null) {
      if (route !== 'record') {
        this.logger.warn('Amendment has no target lease; recorded only', { document: document.id });
      }
      return { outcome: 'recorded', document, lease_id: null, conflicts: [] };
    }

    const openBefore = this.graph.hasLease(leaseId)
      ? new Set(this.graph.conflicts(leaseId, 'open').map((c) => c.id))
      : new Set<string>();

    if (route === 'lease') {
      this.graph.addLease(this.buildLease(prepared));
      this.drainPending(leaseId);
    } else {
      const amendment = this.buildAmendment(prepared, leaseId, document.ingestion_sequence);
      if (!this.graph.hasLease(leaseId)) {
        this.park(amendment);
        return { outcome: 'parked', document, lease_id: leaseId, conflicts: [] };
      }
      this.graph.addAmendment(amendment);
    }

    const conflicts = this.graph
      .conflicts(leaseId, 'open')
      .filter((c) => !openBefore.has(c.id));
    if (conflicts.length > 0) {
      this.logger.info(`${conflicts.length} new conflict(s)`, {
        lease: leaseId,
        document: document.id,
      });
    }
    return { outcome: 'merged', document, lease_id: leaseId, conflicts };
  }

  private buildLease(prepared: PreparedDocument): Lease {
    const candidate = prepared.leaseCandidate ?? {};
    const terms = {
      tenant: candidate.tenant ?? null,
      landlord: candidate.landlord ?? null,
      property_address: candidate.property_address ?? null,
      rentable_square_feet: candidate.rentable_square_feet ?? null,
      usable_square_feet: candidate.usable_square_feet ?? null,
      commencement_date: candidate.commencement_date ?? null,
      expiration_date: candidate.expiration_date ?? null,
      base_rent_monthly: candidate.base_rent_monthly ?? null,
      base_rent_annual: candidate.base_rent_annual ?? null,
      rent_per_square_foot: candidate.rent_per_square_foot ?? null,
      escalation_schedule: candidate.escalation_schedule ?? null,
      security_deposit: candidate.security_deposit ?? null,
      cam_terms: candidate.cam_terms ?? null,
    };
    const { critical, optional } = this.config.scoring.lease;
    const scored = score(terms, critical, optional, prepared.notFound);
    return {
      document_id: prepared.id,
      ...terms,
      confidence: scored.confidence,
      missing: sortedMissing(scored.missing),
      extraction_failed: prepared.extractionFailed,
    };
  }

  private buildAmendment(prepared: PreparedDocument, leaseId: string, sequence: number): Amendment {
    const candidate = prepared.amendmentCandidate;
    // The target may come from the caller's hint rather than the extraction.
    const fields = {
      target_lease_id: leaseId,
      effective_date: candidate?.effective_date ?? null,
      effective_until: candidate?.effective_until ?? null,
      supersedes: candidate?.supersedes ?? null,
    };
    const { critical, optional } = this.config.scoring.amendment;
    const scored = score(fields, critical, optional, prepared.notFound);
    return deepFreeze<Amendment>({
      amendment_id: prepared.id,
      target_lease_id: leaseId,
      effective_date: fields.effective_date,
      effective_until: fields.effective_until,
      supersedes: fields.supersedes,
      ingestion_sequence: sequence,
      changes: candidate?.changes ?? {},
      confidence: scored.confidence,
      missing: sortedMissing(scored.missing),
      extraction_failed: prepared.extractionFailed,
    });
  }

  private park(amendment: Amendment): void {
    const queue = (this.pending.get(amendment.target_lease_id) ?? []).filter(
      (a) => a.amendment_id !== amendment.amendment_id
    );
    queue.push(amendment);
    this.pending.set(amendment.target_lease_id, queue);
    this.logger.warn('Parked amendment for unknown lease', {
      lease: amendment.target_lease_id,
      document: amendment.amendment_id,
    });
  }

  private parkedLeaseId(documentId: string): string | null {
    for (const [leaseId, queue] of this.pending) {
      if (queue.some((a) => a.amendment_id === documentId)) return leaseId;
    }
    return null;
  }

  private drainPending(leaseId: string): void {
    const queue = this.pending.get(leaseId);
    if (!queue) return;
    this.pending.delete(leaseId);
    for (const amendment of queue) {
      this.logger.info('Merging parked amendment', {
        lease: leaseId,
        document: amendment.amendment_id,
      });
      this.graph.addAmendment(amendment);
    }
  }
}
