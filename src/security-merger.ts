/**
 * Security requirement merger
 *
 * Requirements have no key of their own, so each incoming requirement is
 * compared structurally against every requirement already present. Scheme
 * order inside a requirement does not matter; scope order does.
 */

import { isDeepStrictEqual } from 'node:util';
import { SKIP_SUFFIX } from './constants.js';
import type { OpenAPIDocument } from './types/openapi.js';

export function mergeSecurityRequirements(primary: OpenAPIDocument, mixin: OpenAPIDocument): string[] {
  const skipped: string[] = [];
  if (!mixin.security) {
    return skipped;
  }

  if (!primary.security) {
    primary.security = [];
  }
  const security = primary.security;

  for (const requirement of mixin.security) {
    if (security.some(existing => isDeepStrictEqual(existing, requirement))) {
      skipped.push(`security requirement '${JSON.stringify(requirement)}' ${SKIP_SUFFIX}`);
      continue;
    }
    security.push(requirement);
  }

  return skipped;
}
