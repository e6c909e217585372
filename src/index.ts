#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Usage: openapi-mixin [config.json|config.yaml]
 * Without an argument, MIXIN_CONFIG_PATH or the MIXIN_* variables are used.
 */

import 'dotenv/config';
import { ConfigLoader, configFromEnv } from './config.js';
import { getErrorDetails } from './errors.js';
import { createLogger } from './logger.js';
import { runMixin } from './runner.js';

async function main() {
  const logger = createLogger();

  try {
    const configPath = process.argv[2] || process.env.MIXIN_CONFIG_PATH;
    const config = configPath
      ? await new ConfigLoader().load(configPath)
      : configFromEnv();

    const result = await runMixin(config, logger);
    logger.info('Merge finished', {
      skipped: result.skipped.length,
      divergent: result.divergent.length,
    });
  } catch (error) {
    logger.error('Merge failed', error instanceof Error ? error : undefined, getErrorDetails(error));
    process.exit(1);
  }
}

void main();
