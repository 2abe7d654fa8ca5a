/**
 * validate_calculations: stated derived quantities must match what the
 * underlying terms imply.
 *
 *   rent_per_square_foot = base_rent_monthly * 12 / rentable_square_feet
 *   base_rent_annual     = base_rent_monthly * 12
 */

import type { LeaseField, LeaseTerms } from '../core/types.js';
import type { Provenance } from '../graph/fold.js';
import type { ConflictRule, RuleContext } from './types.js';

type DerivedField = 'rent_per_square_foot' | 'base_rent_annual';

function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function withinTolerance(stated: number, computed: number, tolerance: number): boolean {
  return Math.abs(stated - computed) <= Math.abs(stated) * tolerance;
}

function assertFinite(...values: number[]): void {
  for (const value of values) {
    if (!Number.isFinite(value)) throw new Error(`Malformed number: ${value}`);
  }
}

/**
 * Check the derived values stated by `statedBy` against the terms in force.
 */
function validateTerms(
  context: RuleContext,
  terms: LeaseTerms,
  setBy: Provenance,
  statedBy: string,
  fields: ReadonlySet<DerivedField>
): void {
  const monthly = terms.base_rent_monthly;
  if (monthly === null) return;
  const monthlySource = setBy.get('base_rent_monthly') ?? statedBy;

  const perFoot = terms.rent_per_square_foot;
  const rentable = terms.rentable_square_feet;
  if (fields.has('rent_per_square_foot') && perFoot !== null && rentable !== null && rentable > 0) {
    context.check(`rent_per_square_foot stated by ${statedBy}`, () => {
      assertFinite(monthly, rentable, perFoot);
      const computed = roundToCents((monthly * 12) / rentable);
      if (withinTolerance(perFoot, computed, context.tolerances.calculation)) return;
      context.report({
        category: 'calculation_error',
        field: 'rent_per_square_foot',
        source_a: context.source(monthlySource, computed),
        source_b: context.source(statedBy, perFoot),
        description: `Stated rent per square foot ${perFoot} does not match ${computed} (${monthly} x 12 / ${rentable} RSF)`,
      });
    });
  }

  const annual = terms.base_rent_annual;
  if (fields.has('base_rent_annual') && annual !== null) {
    context.check(`base_rent_annual stated by ${statedBy}`, () => {
      assertFinite(monthly, annual);
      const computed = roundToCents(monthly * 12);
      if (withinTolerance(annual, computed, context.tolerances.calculation)) return;
      context.report({
        category: 'calculation_error',
        field: 'base_rent_annual',
        source_a: context.source(monthlySource, computed),
        source_b: context.source(statedBy, annual),
        description: `Stated annual rent ${annual} does not match ${computed} (${monthly} x 12)`,
      });
    });
  }
}

export const validateCalculationsRule: ConflictRule = {
  name: 'validate_calculations',
  evaluate(context) {
    const { base } = context;
    const baseSetBy = new Map<LeaseField, string>([['base_rent_monthly', base.document_id]]);
    validateTerms(
      context,
      base,
      baseSetBy,
      base.document_id,
      new Set<DerivedField>(['rent_per_square_foot', 'base_rent_annual'])
    );

    // An amendment is only held to the derived values it states itself.
    for (const step of context.chain) {
      const changes = step.amendment.changes;
      const stated = new Set<DerivedField>();
      if (changes.rent_per_square_foot?.next != null) stated.add('rent_per_square_foot');
      if (changes.base_rent_annual?.next != null) stated.add('base_rent_annual');
      if (stated.size === 0) continue;
      validateTerms(context, step.after, step.setByAfter, step.amendment.amendment_id, stated);
    }
  },
};
