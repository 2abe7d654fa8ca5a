/**
 * compare_property: restated address and square footage.
 */

import { normalizeAddress } from '../core/values.js';
import { getChange } from '../graph/fold.js';
import type { ConflictRule } from './types.js';

export const comparePropertyRule: ConflictRule = {
  name: 'compare_property',
  evaluate(context) {
    for (const step of context.chain) {
      const id = step.amendment.amendment_id;
      const changes = step.amendment.changes;

      const claimedAddress = getChange(changes, 'property_address')?.prior;
      const addressInForce = step.before.property_address;
      if (claimedAddress && addressInForce) {
        context.check(`property_address restated by ${id}`, () => {
          if (normalizeAddress(claimedAddress) === normalizeAddress(addressInForce)) return;
          context.report({
            category: 'property_conflict',
            field: 'property_address',
            source_a: context.source(
              step.setByBefore.get('property_address') ?? context.base.document_id,
              addressInForce
            ),
            source_b: context.source(id, claimedAddress),
            description: `Amendment ${id} describes the premises as "${claimedAddress}", but "${addressInForce}" is on record`,
          });
        });
      }

      for (const field of ['rentable_square_feet', 'usable_square_feet'] as const) {
        const claimed = getChange(changes, field)?.prior;
        const inForce = step.before[field];
        if (claimed === undefined || claimed === null || inForce === null) continue;

        context.check(`${field} restated by ${id}`, () => {
          if (!Number.isFinite(claimed) || !Number.isFinite(inForce)) {
            throw new Error(`Malformed square footage: ${claimed} / ${inForce}`);
          }
          if (Math.abs(claimed - inForce) <= context.tolerances.square_feet) return;
          context.report({
            category: 'property_conflict',
            field,
            source_a: context.source(step.setByBefore.get(field) ?? context.base.document_id, inForce),
            source_b: context.source(id, claimed),
            description: `Amendment ${id} states ${field} was ${claimed}, but ${inForce} is on record`,
          });
        });
      }
    }
  },
};
