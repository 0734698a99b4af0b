/**
 * Command line arguments
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';

export interface CliOptions {
  configPath: string;
  logDir?: string;
  verbose: boolean;
}

export type CliCommand =
  | { command: 'run'; options: CliOptions }
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'invalid'; message: string };

export const DEFAULT_CONFIG_PATH = 'statuscast.json';

export const USAGE = `
statuscast - watch live streams and feeds, notify chats when they change

Usage: statuscast [options]

Options:
  -c, --config <path>   configuration file (default: ${DEFAULT_CONFIG_PATH})
  --log-dir <dir>       also write JSON Lines logs, one file per day
  -v, --verbose         debug logging
  -h, --help            show this help
  -V, --version         show the version
`.trim();

export function parseArgs(args: string[]): CliCommand {
  const options: CliOptions = {
    configPath: DEFAULT_CONFIG_PATH,
    verbose: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    // --flag=value
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const inline = eq === -1 ? undefined : arg.slice(eq + 1);
    const value = (): string | undefined => {
      if (inline !== undefined) return inline;
      const next = args[i + 1];
      if (next === undefined || next.startsWith('-')) return undefined;
      i++;
      return next;
    };

    switch (flag) {
      case '-h':
      case '--help':
        return { command: 'help' };
      case '-V':
      case '--version':
        return { command: 'version' };
      case '-v':
      case '--verbose':
        options.verbose = true;
        break;
      case '-c':
      case '--config': {
        const configPath = value();
        if (!configPath) {
          return { command: 'invalid', message: `${flag} needs a path` };
        }
        options.configPath = configPath;
        break;
      }
      case '--log-dir': {
        const logDir = value();
        if (!logDir) {
          return { command: 'invalid', message: `${flag} needs a directory` };
        }
        options.logDir = logDir;
        break;
      }
      default:
        return { command: 'invalid', message: `unknown argument '${arg}'` };
    }
  }

  return { command: 'run', options };
}

export function readVersion(): string {
  try {
    const manifest: unknown = JSON.parse(
      readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8')
    );
    if (
      typeof manifest === 'object' &&
      manifest !== null &&
      'version' in manifest &&
      typeof manifest.version === 'string'
    ) {
      return manifest.version;
    }
  } catch (error) {
    return `unknown (${error instanceof Error ? error.message : String(error)})`;
  }
  return 'unknown';
}
