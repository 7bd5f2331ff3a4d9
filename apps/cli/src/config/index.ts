/**
 * CLI Configuration
 *
 * Validates the environment into an AppConfig and applies its log level.
 */

import { ConfigurationError, loadConfig, type AppConfig } from '@dropsort/core';
import { logger } from '@dropsort/utils';
import { printError } from '../lib/output.js';

/**
 * Load configuration or exit with the list of problems
 */
export function loadCliConfig(): AppConfig {
  try {
    const config = loadConfig(process.env, process.cwd());
    logger.level = config.logLevel;
    return config;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      printError('Invalid configuration:');
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exit(1);
    }
    throw error;
  }
}
