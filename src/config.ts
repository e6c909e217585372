/**
 * Merge configuration loader and validator
 *
 * A merge is described either by a config file (JSON or YAML) or by
 * MIXIN_* environment variables. Both go through the same zod schema.
 * Mixin order in the config is the merge priority order.
 */

import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, ValidationError } from './errors.js';

export const mergeConfigSchema = z.object({
  primary: z.string().min(1),
  mixins: z.array(z.string().min(1)).min(1, 'at least one mixin is required'),
  output: z.string().min(1),
  expectedSkips: z.number().int().nonnegative().optional(),
  fixEmptyResponseDescriptions: z.boolean().default(false),
  reviewCollisions: z.boolean().default(false),
}).strict();

export type MergeConfig = z.infer<typeof mergeConfigSchema>;

function validate(raw: unknown, source: string): MergeConfig {
  const result = mergeConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message,
    }));
    throw new ValidationError(
      `Invalid merge configuration in ${source}: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
      { source, issues }
    );
  }
  return result.data;
}

function resolvePaths(config: MergeConfig, baseDir: string): MergeConfig {
  return {
    ...config,
    primary: path.resolve(baseDir, config.primary),
    mixins: config.mixins.map(mixin => path.resolve(baseDir, mixin)),
    output: path.resolve(baseDir, config.output),
  };
}

export class ConfigLoader {
  /**
   * Relative paths in the file are resolved against the file's directory
   */
  async load(configPath: string): Promise<MergeConfig> {
    let content: string;
    try {
      content = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(`Failed to read merge configuration: ${configPath}`, {
        configPath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const ext = path.extname(configPath).toLowerCase();

    let raw: unknown;
    try {
      raw = ext === '.yaml' || ext === '.yml' ? parseYaml(content) : JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Failed to parse merge configuration: ${configPath}`, {
        configPath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const config = validate(raw, configPath);
    return resolvePaths(config, path.dirname(path.resolve(configPath)));
  }
}

/**
 * Build a configuration from MIXIN_* variables; paths resolve against cwd
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): MergeConfig {
  const primary = env.MIXIN_PRIMARY;
  const output = env.MIXIN_OUTPUT;
  const mixins = (env.MIXIN_SOURCES || '')
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);

  const missing: string[] = [];
  if (!primary) missing.push('MIXIN_PRIMARY');
  if (mixins.length === 0) missing.push('MIXIN_SOURCES');
  if (!output) missing.push('MIXIN_OUTPUT');
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(', ')}`,
      { missing }
    );
  }

  let expectedSkips: number | undefined;
  if (env.MIXIN_EXPECTED_SKIPS !== undefined && env.MIXIN_EXPECTED_SKIPS !== '') {
    expectedSkips = Number(env.MIXIN_EXPECTED_SKIPS);
    if (Number.isNaN(expectedSkips)) {
      throw new ConfigurationError('Invalid MIXIN_EXPECTED_SKIPS', {
        value: env.MIXIN_EXPECTED_SKIPS,
      });
    }
  }

  const config = validate({
    primary,
    mixins,
    output,
    expectedSkips,
    fixEmptyResponseDescriptions: (env.MIXIN_FIX_EMPTY_DESCRIPTIONS || 'false').toLowerCase() === 'true',
    reviewCollisions: (env.MIXIN_REVIEW_COLLISIONS || 'false').toLowerCase() === 'true',
  }, 'environment');

  return resolvePaths(config, process.cwd());
}
