/**
 * Library exports for programmatic usage
 */
export { mixin, type MixinOptions } from './mixin.js';
export { collectOperationIds, pathItemOperations } from './operation-ids.js';
export { normalizePrimary } from './normalize.js';
export {
  mergeEntries,
  mergeParameters,
  mergeResponses,
  mergeSchemas,
  mergeSecuritySchemes,
} from './component-mergers.js';
export { mergePaths, renamedOperationId } from './path-merger.js';
export { mergeMetadata, mergeExtensions } from './metadata-merger.js';
export { mergeTags } from './tag-merger.js';
export { mergeSecurityRequirements } from './security-merger.js';
export { fixEmptyResponseDescriptions } from './response-descriptions.js';
export { reviewCollisions, type DivergentCollision } from './collision-review.js';
export { SpecLoader, formatOf } from './spec-loader.js';
export { ConfigLoader, configFromEnv, mergeConfigSchema, type MergeConfig } from './config.js';
export { runMixin, type MixinRunResult } from './runner.js';
export { ConsoleLogger, JsonLogger, LogLevel, createLogger, levelFromEnv, type Logger } from './logger.js';
export {
  MixinError,
  PreconditionError,
  ValidationError,
  ConfigurationError,
  SpecLoadError,
  CollisionCountError,
  isMixinError,
  getErrorDetails,
} from './errors.js';
export type * from './types/openapi.js';
