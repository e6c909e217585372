/**
 * Primary document normalization
 *
 * Mergers write into the primary's containers unconditionally, so every
 * container has to exist before the first mixin is folded in.
 */

import type { OpenAPIDocument } from './types/openapi.js';

/**
 * Initialize missing containers on the primary. Never replaces existing values.
 */
export function normalizePrimary(primary: OpenAPIDocument): void {
  if (!primary.components) {
    primary.components = {};
  }

  const components = primary.components;
  if (!components.securitySchemes) {
    components.securitySchemes = {};
  }
  if (!components.schemas) {
    components.schemas = {};
  }
  if (!components.parameters) {
    components.parameters = {};
  }
  if (!components.responses) {
    components.responses = {};
  }

  if (!primary.security) {
    primary.security = [];
  }

  if (!primary.tags) {
    primary.tags = [];
  }

  if (!primary.paths) {
    primary.paths = {};
  }
}
