/**
 * compare_dates: term ordering, amendment sequencing and window overlap.
 */

import { compareDates } from '../core/values.js';
import { getChange } from '../graph/fold.js';
import type { ConflictRule, RuleContext } from './types.js';

function checkTermOrder(
  context: RuleContext,
  commencement: string | null,
  expiration: string | null,
  commencementSource: string,
  expirationSource: string
): void {
  if (commencement === null || expiration === null) return;
  context.check(`term order ${commencementSource}/${expirationSource}`, () => {
    if (compareDates(expiration, commencement) <= 0) {
      context.report({
        category: 'term_conflict',
        field: 'expiration_date',
        source_a: context.source(commencementSource, commencement),
        source_b: context.source(expirationSource, expiration),
        description: `Expiration date ${expiration} is not after commencement date ${commencement}`,
      });
    }
  });
}

export const compareDatesRule: ConflictRule = {
  name: 'compare_dates',
  evaluate(context) {
    const { base, chain } = context;

    checkTermOrder(
      context,
      base.commencement_date,
      base.expiration_date,
      base.document_id,
      base.document_id
    );

    for (const step of chain) {
      const { amendment, before, after } = step;
      const id = amendment.amendment_id;
      const start = amendment.effective_date;

      // Measured against the base lease, even after an amendment moves commencement.
      const commencement = base.commencement_date;
      if (start !== null && commencement !== null) {
        context.check(`effective date of ${id}`, () => {
          if (compareDates(start, commencement) < 0) {
            context.report({
              category: 'date_sequence',
              field: 'effective_date',
              source_a: context.source(base.document_id, commencement),
              source_b: context.source(id, start),
              description: `Amendment ${id} takes effect ${start}, before the lease commences on ${commencement}`,
            });
          }
        });
      }

      const end = amendment.effective_until;
      if (start !== null && end !== null) {
        context.check(`effective window of ${id}`, () => {
          if (compareDates(end, start) < 0) {
            context.report({
              category: 'date_sequence',
              field: 'effective_until',
              source_a: context.source(id, start),
              source_b: context.source(id, end),
              description: `Amendment ${id} ends ${end}, before it takes effect on ${start}`,
            });
          }
        });
      }

      for (const field of ['commencement_date', 'expiration_date'] as const) {
        const claimed = getChange(amendment.changes, field)?.prior;
        const inForce = before[field];
        if (claimed === undefined || claimed === null || inForce === null) continue;
        context.check(`${field} restated by ${id}`, () => {
          if (compareDates(claimed, inForce) !== 0) {
            context.report({
              category: 'term_conflict',
              field,
              source_a: context.source(step.setByBefore.get(field) ?? base.document_id, inForce),
              source_b: context.source(id, claimed),
              description: `Amendment ${id} states ${field} was ${claimed}, but ${inForce} was in force`,
            });
          }
        });
      }

      const changedTerm =
        getChange(amendment.changes, 'commencement_date')?.next !== undefined ||
        getChange(amendment.changes, 'expiration_date')?.next !== undefined;
      if (changedTerm) {
        checkTermOrder(
          context,
          after.commencement_date,
          after.expiration_date,
          step.setByAfter.get('commencement_date') ?? base.document_id,
          step.setByAfter.get('expiration_date') ?? base.document_id
        );
      }
    }

    // Chain is sorted by start, so only an earlier window's explicit end can overlap.
    for (let i = 0; i < chain.length; i++) {
      const earlier = chain[i].amendment;
      const earlierEnd = earlier.effective_until;
      if (earlier.effective_date === null || earlierEnd === null) continue;
      for (let j = i + 1; j < chain.length; j++) {
        const later = chain[j].amendment;
        const laterStart = later.effective_date;
        if (laterStart === null) continue;
        context.check(`window overlap ${earlier.amendment_id}/${later.amendment_id}`, () => {
          if (compareDates(laterStart, earlierEnd) < 0) {
            context.report({
              category: 'term_conflict',
              field: 'effective_date',
              source_a: context.source(earlier.amendment_id, earlierEnd),
              source_b: context.source(later.amendment_id, laterStart),
              description: `Amendment ${later.amendment_id} takes effect ${laterStart}, inside the window of ${earlier.amendment_id} which runs until ${earlierEnd}`,
            });
          }
        });
      }
    }
  },
};
