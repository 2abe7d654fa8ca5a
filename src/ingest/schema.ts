/**
 * Schemas for what the classification and extraction oracles hand over.
 *
 * Dates stay plain strings here: a malformed date must reach the rules, which
 * isolate it to the one comparison it affects.
 */

import { z } from 'zod';
import { DOCUMENT_TYPES } from '../core/types.js';

const text = z.string().nullable();
const amount = z.number().nonnegative().nullable();
const date = z.string().nullable();

const documentTypeSchema = z.enum(DOCUMENT_TYPES);

export const rentEscalationSchema = z.object({
  effective_date: date.default(null),
  kind: z.enum(['fixed_percentage', 'fixed_amount', 'cpi', 'market_rate']),
  percentage: z.number().nullable().optional(),
  amount: z.number().nullable().optional(),
  frequency_months: z.number().int().positive().nullable().optional(),
});

export const camTermsSchema = z.object({
  base_year: z.number().int().nullable().optional(),
  base_amount: amount.optional(),
  tenant_share_percentage: z.number().min(0).max(100).nullable().optional(),
  cap_percentage: z.number().nonnegative().nullable().optional(),
});

const termSchemas = {
  tenant: text,
  landlord: text,
  property_address: text,
  rentable_square_feet: amount,
  usable_square_feet: amount,
  commencement_date: date,
  expiration_date: date,
  base_rent_monthly: amount,
  base_rent_annual: amount,
  rent_per_square_foot: amount,
  escalation_schedule: z.array(rentEscalationSchema).nullable(),
  security_deposit: amount,
  cam_terms: camTermsSchema.nullable(),
};

function change<T extends z.ZodTypeAny>(value: T) {
  return z.object({ prior: value.optional(), next: value.optional() }).strict().optional();
}

export const changeSetSchema = z
  .object({
    tenant: change(termSchemas.tenant),
    landlord: change(termSchemas.landlord),
    property_address: change(termSchemas.property_address),
    rentable_square_feet: change(termSchemas.rentable_square_feet),
    usable_square_feet: change(termSchemas.usable_square_feet),
    commencement_date: change(termSchemas.commencement_date),
    expiration_date: change(termSchemas.expiration_date),
    base_rent_monthly: change(termSchemas.base_rent_monthly),
    base_rent_annual: change(termSchemas.base_rent_annual),
    rent_per_square_foot: change(termSchemas.rent_per_square_foot),
    escalation_schedule: change(termSchemas.escalation_schedule),
    security_deposit: change(termSchemas.security_deposit),
    cam_terms: change(termSchemas.cam_terms),
  })
  .strict();

/**
 * Lease-like candidate. Every term is optional; absence is what scoring measures.
 */
export const leaseCandidateSchema = z.object({
  tenant: text.optional(),
  landlord: text.optional(),
  property_address: text.optional(),
  rentable_square_feet: amount.optional(),
  usable_square_feet: amount.optional(),
  commencement_date: date.optional(),
  expiration_date: date.optional(),
  base_rent_monthly: amount.optional(),
  base_rent_annual: amount.optional(),
  rent_per_square_foot: amount.optional(),
  escalation_schedule: termSchemas.escalation_schedule.optional(),
  security_deposit: amount.optional(),
  cam_terms: termSchemas.cam_terms.optional(),
});

/**
 * Amendment-like candidate.
 */
export const amendmentCandidateSchema = z.object({
  target_lease_id: z.string().min(1).nullable().optional(),
  effective_date: date.optional(),
  effective_until: date.optional(),
  supersedes: z.string().min(1).nullable().optional(),
  changes: changeSetSchema.default({}),
});

export type LeaseCandidate = z.infer<typeof leaseCandidateSchema>;
export type AmendmentCandidate = z.infer<typeof amendmentCandidateSchema>;

export const documentInputSchema = z.object({
  id: z.string().min(1),
  content_hash: z.string().min(1).optional(),
  text: z.string().optional(),
  lease_id: z.string().min(1).optional(),
  ingested_at: z.string().optional(),
});

export const classificationOutcomeSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    document_type: documentTypeSchema,
    confidence: z.number().min(0).max(1),
    reasoning: z.string().optional(),
    key_indicators: z.array(z.string()).optional(),
    needs_review: z.boolean().optional(),
  }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

export const extractionOutcomeSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    candidate: z.unknown(),
    not_found: z.array(z.string()).default([]),
    confidence: z.number().optional(),
  }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

export const ingestRequestSchema = z.object({
  document: documentInputSchema,
  classification: classificationOutcomeSchema,
  extraction: extractionOutcomeSchema,
});

export type DocumentInput = z.infer<typeof documentInputSchema>;
export type ClassificationOutcome = z.infer<typeof classificationOutcomeSchema>;
export type ExtractionOutcome = z.input<typeof extractionOutcomeSchema>;
export type IngestRequest = z.input<typeof ingestRequestSchema>;
