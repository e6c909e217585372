/**
 * Top-level metadata merger (info, externalDocs, vendor extensions)
 *
 * Scalar fields are filled, never overwritten: the first document to supply
 * a value keeps it, whether that is the primary or an earlier mixin. Filling
 * an empty field is not a collision and produces no diagnostic.
 *
 * Extension keys follow the component rule instead: an existing key wins and
 * the incoming one is reported.
 */

import { defineEntry } from './component-mergers.js';
import { SKIP_SUFFIX } from './constants.js';
import type {
  ExtensionKey,
  Extensions,
  ExternalDocsObject,
  InfoObject,
  OpenAPIDocument,
} from './types/openapi.js';

export function isExtensionKey(key: string): key is ExtensionKey {
  return key.startsWith('x-');
}

/**
 * Copy extension keys of source missing from target.
 * location names the object in diagnostics (document, info, info.contact, info.license).
 */
export function mergeExtensions(target: Extensions, source: Extensions, location: string): string[] {
  const skipped: string[] = [];

  for (const key of Object.keys(source)) {
    if (!isExtensionKey(key)) continue;

    if (Object.hasOwn(target, key)) {
      skipped.push(`${location} extension '${key}' ${SKIP_SUFFIX}`);
      continue;
    }
    defineEntry(target, key, source[key]);
  }

  return skipped;
}

function fillEmpty<T, K extends keyof T>(target: T, source: T, keys: readonly K[]): void {
  for (const key of keys) {
    if (!target[key] && source[key]) {
      target[key] = source[key];
    }
  }
}

/**
 * Adopted metadata is copied so later mixins filling fields on the primary
 * never write into the mixin that supplied it
 */
function copyInfo(info: InfoObject): InfoObject {
  const copy: InfoObject = { ...info };
  if (info.contact) {
    copy.contact = { ...info.contact };
  }
  if (info.license) {
    copy.license = { ...info.license };
  }
  return copy;
}

function mergeInfo(target: InfoObject, source: InfoObject): string[] {
  const skipped = mergeExtensions(target, source, 'info');

  fillEmpty(target, source, ['description', 'title', 'termsOfService', 'version'] as const);

  if (!target.contact) {
    if (source.contact) {
      target.contact = { ...source.contact };
    }
  } else if (source.contact) {
    skipped.push(...mergeExtensions(target.contact, source.contact, 'info.contact'));
    fillEmpty(target.contact, source.contact, ['name', 'url', 'email'] as const);
  }

  if (!target.license) {
    if (source.license) {
      target.license = { ...source.license };
    }
  } else if (source.license) {
    skipped.push(...mergeExtensions(target.license, source.license, 'info.license'));
    fillEmpty(target.license, source.license, ['name', 'url'] as const);
  }

  return skipped;
}

function mergeExternalDocs(target: ExternalDocsObject, source: ExternalDocsObject): void {
  fillEmpty(target, source, ['description', 'url'] as const);
}

export function mergeMetadata(primary: OpenAPIDocument, mixin: OpenAPIDocument): string[] {
  const skipped = mergeExtensions(primary, mixin, 'document');

  if (!primary.info) {
    if (mixin.info) {
      primary.info = copyInfo(mixin.info);
    }
  } else if (mixin.info) {
    skipped.push(...mergeInfo(primary.info, mixin.info));
  }

  if (!primary.externalDocs) {
    if (mixin.externalDocs) {
      primary.externalDocs = { ...mixin.externalDocs };
    }
  } else if (mixin.externalDocs) {
    mergeExternalDocs(primary.externalDocs, mixin.externalDocs);
  }

  return skipped;
}
