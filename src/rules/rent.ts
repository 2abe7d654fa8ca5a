/**
 * compare_rent: money restated by an amendment must match the value in force
 * at that point of the chain, to the cent.
 */

import { sameToTheCent } from '../core/values.js';
import { getChange } from '../graph/fold.js';
import type { ConflictRule } from './types.js';

export const RENT_FIELDS = ['base_rent_monthly', 'base_rent_annual', 'security_deposit'] as const;

function formatAmount(amount: number): string {
  return amount.toFixed(2);
}

export const compareRentRule: ConflictRule = {
  name: 'compare_rent',
  evaluate(context) {
    for (const step of context.chain) {
      const id = step.amendment.amendment_id;
      for (const field of RENT_FIELDS) {
        const claimed = getChange(step.amendment.changes, field)?.prior;
        const inForce = step.before[field];
        if (claimed === undefined || claimed === null || inForce === null) continue;

        context.check(`${field} restated by ${id}`, () => {
          if (sameToTheCent(claimed, inForce)) return;
          const setBy = step.setByBefore.get(field) ?? context.base.document_id;
          context.report({
            category: 'rent_conflict',
            field,
            source_a: context.source(setBy, inForce),
            source_b: context.source(id, claimed),
            description: `Amendment ${id} references ${field} as ${formatAmount(claimed)}, but ${formatAmount(inForce)} (from ${setBy}) was in force`,
          });
        });
      }
    }
  },
};
