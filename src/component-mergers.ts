/**
 * Component collection mergers (schemas, parameters, responses, securitySchemes)
 *
 * All four follow one rule: the first entry to claim a key keeps it, and
 * every later claim is reported as skipped. A name collision is assumed to
 * mean the same definition; no deep comparison and no rename happens here
 * because renaming would require rewriting $refs inside the mixin.
 * See collision-review.ts for an opt-in check of that assumption.
 */

import { SKIP_SUFFIX } from './constants.js';
import type { ComponentsObject, OpenAPIDocument } from './types/openapi.js';

/**
 * Write key as an own data property, so keys such as __proto__ taken from
 * parsed JSON land in the collection instead of on its prototype
 */
export function defineEntry(target: object, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Copy entries of source missing from target, in source order.
 * Returns one diagnostic per key that target already holds.
 */
export function mergeEntries<T>(
  target: Record<string, T>,
  source: Record<string, T>,
  label: string
): string[] {
  const skipped: string[] = [];

  for (const [key, value] of Object.entries(source)) {
    if (Object.hasOwn(target, key)) {
      skipped.push(`${label} entry '${key}' ${SKIP_SUFFIX}`);
      continue;
    }
    defineEntry(target, key, value);
  }

  return skipped;
}

function isEmpty(collection: object): boolean {
  return Object.keys(collection).length === 0;
}

function ensureComponents(primary: OpenAPIDocument): ComponentsObject {
  if (!primary.components) {
    primary.components = {};
  }
  return primary.components;
}

export function mergeSecuritySchemes(primary: OpenAPIDocument, mixin: OpenAPIDocument): string[] {
  const source = mixin.components?.securitySchemes;
  if (!source || isEmpty(source)) return [];

  const components = ensureComponents(primary);
  if (!components.securitySchemes) {
    components.securitySchemes = {};
  }
  return mergeEntries(components.securitySchemes, source, 'securitySchemes');
}

export function mergeSchemas(primary: OpenAPIDocument, mixin: OpenAPIDocument): string[] {
  const source = mixin.components?.schemas;
  if (!source || isEmpty(source)) return [];

  const components = ensureComponents(primary);
  if (!components.schemas) {
    components.schemas = {};
  }
  return mergeEntries(components.schemas, source, 'schemas');
}

export function mergeParameters(primary: OpenAPIDocument, mixin: OpenAPIDocument): string[] {
  const source = mixin.components?.parameters;
  if (!source || isEmpty(source)) return [];

  const components = ensureComponents(primary);
  if (!components.parameters) {
    components.parameters = {};
  }
  return mergeEntries(components.parameters, source, 'components parameters');
}

export function mergeResponses(primary: OpenAPIDocument, mixin: OpenAPIDocument): string[] {
  const source = mixin.components?.responses;
  if (!source || isEmpty(source)) return [];

  const components = ensureComponents(primary);
  if (!components.responses) {
    components.responses = {};
  }
  return mergeEntries(components.responses, source, 'components responses');
}
