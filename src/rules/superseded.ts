/**
 * check_superseded: every amendment must name the document it supersedes,
 * which is the previous document of the chain (the base lease for the first).
 */

import type { ConflictRule } from './types.js';

export const checkSupersededRule: ConflictRule = {
  name: 'check_superseded',
  evaluate(context) {
    for (const step of context.chain) {
      const { amendment, previousDocumentId } = step;
      const reference = amendment.supersedes;
      if (reference === previousDocumentId) continue;

      const description =
        reference === null
          ? `Amendment ${amendment.amendment_id} does not reference the document it supersedes (expected ${previousDocumentId})`
          : `Amendment ${amendment.amendment_id} supersedes ${reference}, but the preceding document is ${previousDocumentId}`;

      context.report({
        category: 'term_conflict',
        field: 'supersedes',
        source_a: context.source(previousDocumentId, previousDocumentId),
        source_b: context.source(amendment.amendment_id, reference),
        description,
      });
    }
  },
};
