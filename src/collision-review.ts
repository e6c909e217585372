/**
 * Review of component name collisions
 *
 * The merge assumes that two components sharing a name are the same
 * definition. This check runs after a merge and lists the skipped entries
 * whose body differs from the entry that was kept, so a human can decide
 * whether the collision hides a real divergence. It never changes the merge.
 */

import { isDeepStrictEqual } from 'node:util';
import type { MergedComponentKey, OpenAPIDocument } from './types/openapi.js';

export interface DivergentCollision {
  category: MergedComponentKey;
  key: string;
  mixinIndex: number;
}

const REVIEWED_CATEGORIES: readonly MergedComponentKey[] = [
  'securitySchemes',
  'schemas',
  'parameters',
  'responses',
];

function entriesOf(document: OpenAPIDocument, category: MergedComponentKey): Record<string, unknown> {
  return document.components?.[category] ?? {};
}

/**
 * merged must be the primary after mixin() ran with the same mixins
 */
export function reviewCollisions(
  merged: OpenAPIDocument,
  mixins: ReadonlyArray<OpenAPIDocument | null | undefined>
): DivergentCollision[] {
  const divergent: DivergentCollision[] = [];

  for (const [mixinIndex, source] of mixins.entries()) {
    if (!source) continue;

    for (const category of REVIEWED_CATEGORIES) {
      const kept = entriesOf(merged, category);

      for (const [key, value] of Object.entries(entriesOf(source, category))) {
        if (!Object.hasOwn(kept, key)) continue;
        if (!isDeepStrictEqual(kept[key], value)) {
          divergent.push({ category, key, mixinIndex });
        }
      }
    }
  }

  return divergent;
}
