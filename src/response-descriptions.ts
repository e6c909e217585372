/**
 * Post-merge repair of response descriptions
 *
 * description is required on OpenAPI response objects, but partial specs
 * often omit it. Fills "(empty)" into every inline response without one.
 */

import { ALL_HTTP_METHODS, EMPTY_RESPONSE_DESCRIPTION } from './constants.js';
import type { OpenAPIDocument, ResponseEntry } from './types/openapi.js';

function fixResponse(response: ResponseEntry | undefined): boolean {
  if (!response || '$ref' in response) {
    return false;
  }
  if (response.description) {
    return false;
  }
  response.description = EMPTY_RESPONSE_DESCRIPTION;
  return true;
}

/**
 * Returns the number of responses that received a description.
 *
 * Response objects are written in place. After mixin() the primary shares
 * component and operation responses with the mixins it took them from, so
 * those mixin documents see the filled descriptions as well.
 */
export function fixEmptyResponseDescriptions(document: OpenAPIDocument): number {
  let fixed = 0;

  for (const response of Object.values(document.components?.responses ?? {})) {
    if (fixResponse(response)) fixed++;
  }

  for (const pathItem of Object.values(document.paths ?? {})) {
    if (!pathItem) continue;

    for (const method of ALL_HTTP_METHODS) {
      const operation = pathItem[method];
      if (!operation?.responses) continue;

      for (const response of Object.values(operation.responses)) {
        if (fixResponse(response)) fixed++;
      }
    }
  }

  return fixed;
}
