/**
 * compare_parties: restated party names, compared after normalization.
 */

import { normalizePartyName } from '../core/values.js';
import { getChange } from '../graph/fold.js';
import type { ConflictRule } from './types.js';

export const comparePartiesRule: ConflictRule = {
  name: 'compare_parties',
  evaluate(context) {
    for (const step of context.chain) {
      const id = step.amendment.amendment_id;
      for (const field of ['tenant', 'landlord'] as const) {
        const claimed = getChange(step.amendment.changes, field)?.prior;
        const inForce = step.before[field];
        if (!claimed || !inForce) continue;

        context.check(`${field} restated by ${id}`, () => {
          // Formatting-only differences (case, punctuation, "LLC") are not conflicts.
          if (normalizePartyName(claimed) === normalizePartyName(inForce)) return;
          context.report({
            category: 'party_conflict',
            field,
            source_a: context.source(step.setByBefore.get(field) ?? context.base.document_id, inForce),
            source_b: context.source(id, claimed),
            description: `Amendment ${id} names the ${field} "${claimed}", but "${inForce}" is on record`,
          });
        });
      }
    }
  },
};
