/**
 * Operation identifier harvesting
 *
 * operationIds must be unique across a whole document, so the merge keeps a
 * running set seeded from the primary and grown as paths are added.
 */

import { MERGED_HTTP_METHODS, type MergedHttpMethod } from './constants.js';
import type { OpenAPIDocument, OperationObject, PathItemObject } from './types/openapi.js';

export interface PathItemOperation {
  method: MergedHttpMethod;
  operation: OperationObject;
}

/**
 * Present operations of a path item, in get/put/post/delete/head/patch order
 */
export function pathItemOperations(pathItem: PathItemObject): PathItemOperation[] {
  const operations: PathItemOperation[] = [];
  for (const method of MERGED_HTTP_METHODS) {
    const operation = pathItem[method];
    if (operation) {
      operations.push({ method, operation });
    }
  }
  return operations;
}

/**
 * Collect every operationId used in the document's paths (exact match, no normalization)
 */
export function collectOperationIds(document: OpenAPIDocument): Set<string> {
  const ids = new Set<string>();
  if (!document.paths) {
    return ids;
  }

  for (const pathItem of Object.values(document.paths)) {
    if (!pathItem) continue;

    for (const { operation } of pathItemOperations(pathItem)) {
      if (operation.operationId !== undefined) {
        ids.add(operation.operationId);
      }
    }
  }

  return ids;
}
