/**
 * Tests for merge configuration loading
 */

import { describe, it, expect } from 'vitest';
import path from 'path';
import { ConfigLoader, configFromEnv } from './config.js';
import { ConfigurationError, ValidationError } from './errors.js';

const specsDir = path.join(process.cwd(), 'src/testing/specs');

describe('ConfigLoader', () => {
  const loader = new ConfigLoader();

  it('loads a YAML config and resolves paths against its directory', async () => {
    const config = await loader.load(path.join(specsDir, 'merge.yaml'));

    expect(config).toEqual({
      primary: path.join(specsDir, 'petstore.yaml'),
      mixins: [path.join(specsDir, 'owners.json')],
      output: path.resolve(specsDir, '../../../dist/merged.yaml'),
      expectedSkips: 3,
      fixEmptyResponseDescriptions: true,
      reviewCollisions: false,
    });
  });

  it('reports every schema violation', async () => {
    const configPath = path.join(specsDir, 'invalid-config.json');

    const error = await loader.load(configPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      code: 'VALIDATION_ERROR',
      details: {
        source: configPath,
        issues: [
          { path: 'mixins', message: 'at least one mixin is required' },
          { path: 'expectedSkips' },
          { path: '(root)' },
        ],
      },
    });
  });

  it('reports a missing config file with its path', async () => {
    const configPath = path.join(specsDir, 'missing-config.yaml');

    await expect(loader.load(configPath)).rejects.toMatchObject({
      code: 'CONFIGURATION_ERROR',
      message: `Failed to read merge configuration: ${configPath}`,
      details: { configPath },
    });
  });

  it('wraps parse failures in a ConfigurationError', async () => {
    await expect(loader.load(path.join(specsDir, 'broken.yaml'))).rejects.toThrow(ConfigurationError);
  });
});

describe('configFromEnv', () => {
  it('builds a config from MIXIN_* variables', () => {
    const config = configFromEnv({
      MIXIN_PRIMARY: 'specs/core.yaml',
      MIXIN_SOURCES: 'specs/a.yaml, specs/b.json,,',
      MIXIN_OUTPUT: 'out/api.yaml',
      MIXIN_EXPECTED_SKIPS: '2',
      MIXIN_FIX_EMPTY_DESCRIPTIONS: 'TRUE',
    });

    expect(config).toEqual({
      primary: path.resolve('specs/core.yaml'),
      mixins: [path.resolve('specs/a.yaml'), path.resolve('specs/b.json')],
      output: path.resolve('out/api.yaml'),
      expectedSkips: 2,
      fixEmptyResponseDescriptions: true,
      reviewCollisions: false,
    });
  });

  it('names every missing variable', () => {
    expect(() => configFromEnv({ MIXIN_PRIMARY: 'core.yaml' })).toThrow(
      'Missing required environment variables: MIXIN_SOURCES, MIXIN_OUTPUT'
    );
  });

  it('rejects a non-numeric expected skip count', () => {
    expect(() => configFromEnv({
      MIXIN_PRIMARY: 'core.yaml',
      MIXIN_SOURCES: 'a.yaml',
      MIXIN_OUTPUT: 'out.yaml',
      MIXIN_EXPECTED_SKIPS: 'many',
    })).toThrow(ConfigurationError);
  });

  it('rejects a fractional expected skip count', () => {
    expect(() => configFromEnv({
      MIXIN_PRIMARY: 'core.yaml',
      MIXIN_SOURCES: 'a.yaml',
      MIXIN_OUTPUT: 'out.yaml',
      MIXIN_EXPECTED_SKIPS: '1.5',
    })).toThrow(ValidationError);
  });
});
