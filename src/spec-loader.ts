/**
 * OpenAPI document file I/O
 *
 * The merge works on parsed trees only; this is the collaborator that reads
 * and writes them. Format follows the file extension.
 */

import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { SpecLoadError } from './errors.js';
import type { OpenAPIDocument } from './types/openapi.js';

export type SpecFormat = 'yaml' | 'json';

export function formatOf(specPath: string): SpecFormat | undefined {
  const ext = path.extname(specPath).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  return undefined;
}

function isDocumentRoot(value: unknown): value is OpenAPIDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SpecLoader {
  async load(specPath: string): Promise<OpenAPIDocument> {
    const format = formatOf(specPath);
    if (!format) {
      throw new SpecLoadError(`Unsupported spec file extension: ${specPath}`, specPath);
    }

    let content: string;
    try {
      content = await fs.readFile(specPath, 'utf-8');
    } catch (error) {
      throw new SpecLoadError(
        `Failed to read spec: ${specPath}`,
        specPath,
        error instanceof Error ? error.message : String(error)
      );
    }

    let parsed: unknown;
    try {
      parsed = format === 'yaml' ? parseYaml(content) : JSON.parse(content);
    } catch (error) {
      throw new SpecLoadError(
        `Failed to parse ${format.toUpperCase()} spec: ${specPath}`,
        specPath,
        error instanceof Error ? error.message : String(error)
      );
    }

    if (!isDocumentRoot(parsed)) {
      throw new SpecLoadError(`Spec root must be an object: ${specPath}`, specPath);
    }

    return parsed;
  }

  /**
   * Load several specs, keeping their order
   */
  async loadAll(specPaths: readonly string[]): Promise<OpenAPIDocument[]> {
    const documents: OpenAPIDocument[] = [];
    for (const specPath of specPaths) {
      documents.push(await this.load(specPath));
    }
    return documents;
  }

  async write(specPath: string, document: OpenAPIDocument): Promise<void> {
    const format = formatOf(specPath);
    if (!format) {
      throw new SpecLoadError(`Unsupported spec file extension: ${specPath}`, specPath);
    }

    const content = format === 'yaml'
      ? stringifyYaml(document)
      : `${JSON.stringify(document, null, 2)}\n`;

    await fs.mkdir(path.dirname(specPath), { recursive: true });
    await fs.writeFile(specPath, content, 'utf-8');
  }
}
