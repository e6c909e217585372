/**
 * Merge runner: files in, merged file out
 *
 * Coordinates the spec loader, the merge and the optional post-merge steps
 * for one merge configuration.
 */

import { reviewCollisions, type DivergentCollision } from './collision-review.js';
import type { MergeConfig } from './config.js';
import { CollisionCountError } from './errors.js';
import type { Logger } from './logger.js';
import { mixin } from './mixin.js';
import { fixEmptyResponseDescriptions } from './response-descriptions.js';
import { SpecLoader } from './spec-loader.js';
import type { OpenAPIDocument } from './types/openapi.js';

export interface MixinRunResult {
  document: OpenAPIDocument;
  skipped: string[];
  fixedDescriptions: number;
  divergent: DivergentCollision[];
}

/**
 * The merged document is written before the expected skip count is checked,
 * so a mismatch can be inspected in the output file.
 */
export async function runMixin(
  config: MergeConfig,
  logger: Logger,
  loader: SpecLoader = new SpecLoader()
): Promise<MixinRunResult> {
  logger.info('Loading specs', { primary: config.primary, mixins: config.mixins.length });
  const document = await loader.load(config.primary);
  const mixins = await loader.loadAll(config.mixins);

  const skipped = mixin(document, mixins, { logger });
  for (const warning of skipped) {
    logger.warn(warning);
  }

  let divergent: DivergentCollision[] = [];
  if (config.reviewCollisions) {
    divergent = reviewCollisions(document, mixins);
    for (const collision of divergent) {
      logger.warn(`${collision.category} entry '${collision.key}' from mixin ${config.mixins[collision.mixinIndex]} differs from the kept definition`, {
        category: collision.category,
        key: collision.key,
        mixinIndex: collision.mixinIndex,
      });
    }
  }

  let fixedDescriptions = 0;
  if (config.fixEmptyResponseDescriptions) {
    fixedDescriptions = fixEmptyResponseDescriptions(document);
    if (fixedDescriptions > 0) {
      logger.info('Filled empty response descriptions', { count: fixedDescriptions });
    }
  }

  await loader.write(config.output, document);
  logger.info('Wrote merged spec', { output: config.output, skipped: skipped.length });

  if (config.expectedSkips !== undefined && config.expectedSkips !== skipped.length) {
    throw new CollisionCountError(config.expectedSkips, skipped.length);
  }

  return { document, skipped, fixedDescriptions, divergent };
}
