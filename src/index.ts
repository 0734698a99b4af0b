#!/usr/bin/env node
/**
 * statuscast - live stream and feed watcher
 *
 * Entry point for the watcher process
 */

import 'dotenv/config';

import { StatuscastApp } from './app';
import { parseArgs, readVersion, USAGE } from './cli';
import { type AppConfig, loadConfig } from './config';
import {
  ConfigError,
  configureLogging,
  LogEvent,
  type LogMetadata,
  logger,
  serializeError,
} from './utils';

async function main(): Promise<number | undefined> {
  const cli = parseArgs(process.argv.slice(2));
  switch (cli.command) {
    case 'help':
      console.log(USAGE);
      return 0;
    case 'version':
      console.log(readVersion());
      return 0;
    case 'invalid':
      console.error(`${cli.message}\n\n${USAGE}`);
      return 2;
    case 'run':
      break;
  }

  const { options } = cli;
  configureLogging({ verbose: options.verbose, logDir: options.logDir });
  logger.info('statuscast starting...');

  let config: AppConfig;
  try {
    config = await loadConfig(options.configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      const metadata: LogMetadata = {
        eventType: LogEvent.CONFIG_ERROR,
        issues: error.issues,
      };
      logger.error(error.message, undefined, metadata);
      return 1;
    }
    throw error;
  }

  const app = new StatuscastApp(config);
  await app.start();

  logger.success('statuscast is ready');
  logger.info('Press Ctrl+C to stop');

  // Graceful shutdown
  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`Received ${signal}, shutting down...`);
    app.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', undefined, {
          error: serializeError(error),
        });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  return undefined;
}

main().then(
  (code) => {
    if (code !== undefined) {
      process.exitCode = code;
    }
  },
  (error: unknown) => {
    logger.error('Failed to start statuscast', undefined, {
      error: serializeError(error),
    });
    process.exit(1);
  }
);
