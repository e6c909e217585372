/**
 * Mixin orchestrator
 *
 * Folds partial OpenAPI documents (mixins) into a primary document. The
 * primary is modified in place and becomes the merge result.
 *
 * Priority: the primary wins over every mixin, and an earlier mixin wins
 * over a later one. Entries that lose are skipped and reported; the returned
 * list is meant to be compared against an expected collision count in build
 * scripts. Review collisions before accepting them and rename where you can.
 *
 * No key normalization takes place (paths, schema names, operationIds).
 * Make sure keys are canonical if downstream tools normalize them.
 *
 * Consider calling fixEmptyResponseDescriptions() on the result when the
 * inputs were read from storage.
 */

import {
  mergeParameters,
  mergeResponses,
  mergeSchemas,
  mergeSecuritySchemes,
} from './component-mergers.js';
import { PreconditionError } from './errors.js';
import type { Logger } from './logger.js';
import { mergeMetadata } from './metadata-merger.js';
import { normalizePrimary } from './normalize.js';
import { collectOperationIds } from './operation-ids.js';
import { mergePaths } from './path-merger.js';
import { mergeSecurityRequirements } from './security-merger.js';
import { mergeTags } from './tag-merger.js';
import type { OpenAPIDocument } from './types/openapi.js';

export interface MixinOptions {
  /** Receives one debug line per merged mixin */
  logger?: Logger;
}

/**
 * Merge mixins into primary, highest priority first.
 * Returns every skip diagnostic, mixin by mixin, category by category.
 */
export function mixin(
  primary: OpenAPIDocument | null | undefined,
  mixins: ReadonlyArray<OpenAPIDocument | null | undefined>,
  options: MixinOptions = {}
): string[] {
  if (primary === null || primary === undefined || typeof primary !== 'object') {
    throw new PreconditionError('Cannot merge mixins into a missing primary document', {
      primary: primary === null ? 'null' : typeof primary,
    });
  }

  const skipped: string[] = [];
  if (mixins.length === 0) {
    return skipped;
  }

  const operationIds = collectOperationIds(primary);
  normalizePrimary(primary);

  for (const [index, source] of mixins.entries()) {
    if (!source) {
      options.logger?.debug('Mixin is empty, nothing to merge', { mixinIndex: index });
      continue;
    }

    const before = skipped.length;

    skipped.push(...mergeMetadata(primary, source));
    skipped.push(...mergeTags(primary, source));
    skipped.push(...mergeSecuritySchemes(primary, source));
    skipped.push(...mergeSecurityRequirements(primary, source));
    skipped.push(...mergeSchemas(primary, source));
    // paths need the running operationId set
    skipped.push(...mergePaths(primary, source, operationIds, index));
    skipped.push(...mergeParameters(primary, source));
    skipped.push(...mergeResponses(primary, source));

    options.logger?.debug('Merged mixin', {
      mixinIndex: index,
      skipped: skipped.length - before,
    });
  }

  return skipped;
}
