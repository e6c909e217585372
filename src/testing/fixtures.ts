/**
 * Document builders for merge tests
 *
 * Small petstore-style fragments; each call returns fresh objects so tests
 * can mutate them freely.
 */

import type { OpenAPIDocument, OperationObject, PathItemObject } from '../types/openapi.js';

export function operation(operationId: string, summary?: string): OperationObject {
  return {
    operationId,
    ...(summary ? { summary } : {}),
    responses: {
      '200': { description: 'OK' },
    },
  };
}

export function getPath(operationId: string): PathItemObject {
  return { get: operation(operationId) };
}

export function petsPrimary(): OpenAPIDocument {
  return {
    openapi: '3.0.3',
    info: { title: 'Pet Store', version: '1.0.0' },
    paths: {
      '/pets': getPath('listPets'),
    },
    components: {
      schemas: {
        Pet: { type: 'object', properties: { name: { type: 'string' } } },
      },
    },
  };
}

export function ownersMixin(): OpenAPIDocument {
  return {
    openapi: '3.0.3',
    info: { title: 'Owners', version: '0.1.0', description: 'Owner endpoints' },
    tags: [{ name: 'owners', description: 'Pet owners' }],
    paths: {
      '/owners': {
        get: operation('listOwners'),
        post: operation('createOwner'),
      },
    },
    components: {
      schemas: {
        Owner: { type: 'object', properties: { id: { type: 'integer' } } },
      },
      parameters: {
        OwnerId: { name: 'ownerId', in: 'path', required: true, schema: { type: 'integer' } },
      },
      responses: {
        NotFound: { description: 'Owner not found' },
      },
      securitySchemes: {
        apiKey: { type: 'apiKey', name: 'X-API-Key', in: 'header' },
      },
    },
    security: [{ apiKey: [] }],
  };
}

/**
 * Every operationId in document order (paths in key order, verbs in merge order)
 */
export function allOperationIds(document: OpenAPIDocument): string[] {
  const ids: string[] = [];
  for (const pathItem of Object.values(document.paths ?? {})) {
    for (const method of ['get', 'put', 'post', 'delete', 'head', 'patch'] as const) {
      const id = pathItem?.[method]?.operationId;
      if (id !== undefined) ids.push(id);
    }
  }
  return ids;
}
