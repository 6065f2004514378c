#!/usr/bin/env node
/**
 * upstream-head CLI entrypoint. Takes no arguments.
 * Prints the HEAD commit of a fresh shallow clone of the upstream repository.
 */

import { parseConfig } from '../config.js';
import { createLogger } from '../logging/logger.js';
import { runCli } from './run.js';

let parsedConfig: ReturnType<typeof parseConfig>;
try {
  parsedConfig = parseConfig(process.env);
} catch (err) {
  createLogger('error').error({ err }, 'Invalid configuration');
  process.exit(1);
}

const log = createLogger(parsedConfig.config.logLevel);
for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}

process.exitCode = await runCli({ config: parsedConfig.config, stdout: process.stdout, log });
