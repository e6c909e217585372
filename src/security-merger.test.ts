import { describe, it, expect } from 'vitest';
import { mergeSecurityRequirements } from './security-merger.js';
import type { OpenAPIDocument } from './types/openapi.js';

describe('mergeSecurityRequirements', () => {
  it('skips a requirement that is structurally equal to an existing one', () => {
    const primary: OpenAPIDocument = {
      security: [{ oauth: ['read', 'write'], apiKey: [] }],
    };
    const source: OpenAPIDocument = {
      security: [{ apiKey: [], oauth: ['read', 'write'] }],
    };

    const skipped = mergeSecurityRequirements(primary, source);

    expect(skipped).toEqual([
      `security requirement '{"apiKey":[],"oauth":["read","write"]}' already exists in primary or higher priority mixin, skipping`,
    ]);
    expect(primary.security).toHaveLength(1);
  });

  it('appends requirements that differ in schemes or scopes', () => {
    const primary: OpenAPIDocument = { security: [{ oauth: ['read'] }] };
    const source: OpenAPIDocument = {
      security: [{ oauth: ['read', 'write'] }, { apiKey: [] }],
    };

    expect(mergeSecurityRequirements(primary, source)).toEqual([]);
    expect(primary.security).toEqual([
      { oauth: ['read'] },
      { oauth: ['read', 'write'] },
      { apiKey: [] },
    ]);
  });

  it('creates the requirement list when the primary has none', () => {
    const primary: OpenAPIDocument = {};

    mergeSecurityRequirements(primary, { security: [{}] });

    expect(primary.security).toEqual([{}]);
  });
});
