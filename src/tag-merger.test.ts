import { describe, it, expect } from 'vitest';
import { mergeTags } from './tag-merger.js';
import type { OpenAPIDocument } from './types/openapi.js';

describe('mergeTags', () => {
  it('appends new tags in mixin order', () => {
    const primary: OpenAPIDocument = { tags: [{ name: 'pets' }] };
    const source: OpenAPIDocument = { tags: [{ name: 'stores' }, { name: 'owners' }] };

    expect(mergeTags(primary, source)).toEqual([]);
    expect(primary.tags?.map(tag => tag.name)).toEqual(['pets', 'stores', 'owners']);
  });

  it('treats tags with the same name as a collision regardless of description', () => {
    const primary: OpenAPIDocument = { tags: [{ name: 'pets', description: 'Pets' }] };
    const source: OpenAPIDocument = { tags: [{ name: 'pets', description: 'Animals for sale' }] };

    const skipped = mergeTags(primary, source);

    expect(skipped).toEqual([
      "top level tags entry with name 'pets' already exists in primary or higher priority mixin, skipping",
    ]);
    expect(primary.tags).toEqual([{ name: 'pets', description: 'Pets' }]);
  });

  it('creates the tag list when the primary has none', () => {
    const primary: OpenAPIDocument = {};

    mergeTags(primary, { tags: [{ name: 'owners' }] });

    expect(primary.tags).toEqual([{ name: 'owners' }]);
  });

  it('does nothing when the mixin has no tags', () => {
    const primary: OpenAPIDocument = {};

    expect(mergeTags(primary, {})).toEqual([]);
    expect(primary.tags).toBeUndefined();
  });
});
