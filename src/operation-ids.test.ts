import { describe, it, expect } from 'vitest';
import { collectOperationIds, pathItemOperations } from './operation-ids.js';
import { operation } from './testing/fixtures.js';

describe('pathItemOperations', () => {
  it('visits get, put, post, delete, head, patch in that order', () => {
    const ops = pathItemOperations({
      patch: operation('patchPet'),
      get: operation('getPet'),
      head: operation('headPet'),
      post: operation('createPet'),
    });

    expect(ops.map(op => op.method)).toEqual(['get', 'post', 'head', 'patch']);
    expect(ops.map(op => op.operation.operationId)).toEqual(['getPet', 'createPet', 'headPet', 'patchPet']);
  });

  it('ignores options and trace', () => {
    const ops = pathItemOperations({
      options: operation('optionsPet'),
      trace: operation('tracePet'),
    });

    expect(ops).toEqual([]);
  });
});

describe('collectOperationIds', () => {
  it('returns an empty set when the document has no paths', () => {
    expect(collectOperationIds({ openapi: '3.0.3' }).size).toBe(0);
  });

  it('collects ids across paths and verbs', () => {
    const ids = collectOperationIds({
      paths: {
        '/pets': { get: operation('listPets'), post: operation('createPet') },
        '/pets/{id}': { delete: operation('deletePet') },
      },
    });

    expect([...ids]).toEqual(['listPets', 'createPet', 'deletePet']);
  });

  it('matches ids exactly', () => {
    const ids = collectOperationIds({
      paths: {
        '/a': { get: operation('listPets') },
        '/b': { get: operation('ListPets') },
      },
    });

    expect(ids.has('listPets')).toBe(true);
    expect(ids.has('ListPets')).toBe(true);
    expect(ids.has('listpets')).toBe(false);
  });

  it('skips operations without an id', () => {
    const ids = collectOperationIds({
      paths: {
        '/health': { get: { responses: {} } },
      },
    });

    expect(ids.size).toBe(0);
  });
});
