#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   pointrec --config ./config.json [--rtu AREC | --substation ARE]
 */

import { randomUUID } from 'node:crypto';
import { wrapError } from '@pointrec/core';
import { ReconError, formatRunSummary, scopeKey } from '@pointrec/recon-core';
import { USAGE, parseArgs } from './args.js';
import { ConfigError, loadConfig } from './config.js';
import { Logger } from './logger.js';
import { runReconciliation } from './run.js';

async function main(): Promise<void> {
  let logger = new Logger();

  try {
    const options = parseArgs(process.argv.slice(2));
    if (options.help) {
      process.stdout.write(`${USAGE}\n`);
      return;
    }

    const config = await loadConfig(options.configPath);
    const runId = randomUUID();
    logger = new Logger(config.logging).child({ runId, scope: scopeKey(options.scope) });
    logger.info('Starting reconciliation', { config: options.configPath });

    const { result, reportPath } = await runReconciliation({ runId, options, config, logger });

    process.stdout.write(`${formatRunSummary(result)}\n`);
    process.stdout.write(`Report: ${reportPath}\n`);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      process.stderr.write(`${error.message}\n`);
    } else {
      const failure = error instanceof ReconError ? error : wrapError(error);
      logger.error(failure.message, { error: failure.toJSON() });
      process.stderr.write(`${failure.toActionableMessage()}\n`);
    }
    process.exit(1);
  }
}

void main();
