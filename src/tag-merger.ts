/**
 * Top-level tag merger. Tags are unique by name only: a second tag with the
 * same name collides even when its description differs.
 */

import { SKIP_SUFFIX } from './constants.js';
import type { OpenAPIDocument } from './types/openapi.js';

export function mergeTags(primary: OpenAPIDocument, mixin: OpenAPIDocument): string[] {
  const skipped: string[] = [];
  if (!mixin.tags) {
    return skipped;
  }

  if (!primary.tags) {
    primary.tags = [];
  }
  const tags = primary.tags;

  for (const tag of mixin.tags) {
    if (tags.some(existing => existing.name === tag.name)) {
      skipped.push(`top level tags entry with name '${tag.name}' ${SKIP_SUFFIX}`);
      continue;
    }
    tags.push(tag);
  }

  return skipped;
}
