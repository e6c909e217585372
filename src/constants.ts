/**
 * Merge constants
 *
 * Why: The verb order and the rename marker decide what merged documents
 * look like. Keeping them in one place keeps renames reproducible.
 */

/**
 * Operation slots that take part in operationId harvesting and renaming,
 * in visiting order
 */
export const MERGED_HTTP_METHODS = ['get', 'put', 'post', 'delete', 'head', 'patch'] as const;

export type MergedHttpMethod = (typeof MERGED_HTTP_METHODS)[number];

/**
 * Every operation slot a path item can hold
 */
export const ALL_HTTP_METHODS = [...MERGED_HTTP_METHODS, 'options', 'trace'] as const;

export type HttpMethod = (typeof ALL_HTTP_METHODS)[number];

/**
 * Marker appended to a colliding operationId, followed by the mixin index
 */
export const OPERATION_ID_MIXIN_MARKER = 'Mixin';

/**
 * Description written into responses that have none
 */
export const EMPTY_RESPONSE_DESCRIPTION = '(empty)';

export const SKIP_SUFFIX = 'already exists in primary or higher priority mixin, skipping';
