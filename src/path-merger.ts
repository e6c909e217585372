/**
 * Path merger
 *
 * A path key that already exists is skipped as a whole: two path items for
 * the same route cannot be combined per verb without the caller deciding
 * which one is meant. operationId collisions are only labels, so they are
 * renamed instead.
 */

import { defineEntry } from './component-mergers.js';
import { OPERATION_ID_MIXIN_MARKER, SKIP_SUFFIX } from './constants.js';
import { pathItemOperations } from './operation-ids.js';
import type { OpenAPIDocument, PathItemObject } from './types/openapi.js';

/**
 * Name given to an operationId that collides while merging mixin number mixinIndex.
 * The marker is appended again while the result is still taken.
 */
export function renamedOperationId(operationId: string, mixinIndex: number, taken: Set<string>): string {
  let renamed = `${operationId}${OPERATION_ID_MIXIN_MARKER}${mixinIndex}`;
  while (taken.has(renamed)) {
    renamed = `${renamed}${OPERATION_ID_MIXIN_MARKER}${mixinIndex}`;
  }
  return renamed;
}

/**
 * Add the mixin's paths to the primary.
 *
 * operationIds is read and extended in place; it must hold every id already
 * present in the primary. The inserted path item is a shallow copy, and an
 * operation is copied only when its id has to change, so the mixin itself
 * is left untouched. A null path item is merged as an empty one.
 */
export function mergePaths(
  primary: OpenAPIDocument,
  mixin: OpenAPIDocument,
  operationIds: Set<string>,
  mixinIndex: number
): string[] {
  const skipped: string[] = [];
  if (!mixin.paths) {
    return skipped;
  }

  if (!primary.paths) {
    primary.paths = {};
  }
  const paths = primary.paths;

  for (const [pathKey, pathItem] of Object.entries(mixin.paths)) {
    if (Object.hasOwn(paths, pathKey)) {
      skipped.push(`paths entry '${pathKey}' ${SKIP_SUFFIX}`);
      continue;
    }

    // a key with no body (`/health:` in YAML) parses to null
    const source: PathItemObject = pathItem ?? {};
    const merged: PathItemObject = { ...source };
    for (const { method, operation } of pathItemOperations(source)) {
      const operationId = operation.operationId;
      if (operationId === undefined) continue;

      if (operationIds.has(operationId)) {
        const renamed = renamedOperationId(operationId, mixinIndex, operationIds);
        merged[method] = { ...operation, operationId: renamed };
        operationIds.add(renamed);
      } else {
        operationIds.add(operationId);
      }
    }

    defineEntry(paths, pathKey, merged);
  }

  return skipped;
}
