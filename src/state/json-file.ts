/**
 * JSON file state store
 *
 * One file per subscription key under `directory`, named after the
 * URI-encoded key. Files are loaded lazily and cached; every commit rewrites
 * the key's file atomically.
 */

import path from 'node:path';
import { type Snapshot, snapshotSchema } from '../sources';
import {
  CommitError,
  getLogger,
  LogEvent,
  readJsonFile,
  serializeError,
  writeJsonFileAtomic,
} from '../utils';
import type { StateStore } from './types';

const logger = getLogger('StateStore');

export class JsonFileStateStore implements StateStore {
  private readonly directory: string;
  private cache = new Map<string, Snapshot | undefined>();

  constructor(directory: string) {
    this.directory = directory;
  }

  fileFor(key: string): string {
    return path.join(this.directory, `${encodeURIComponent(key)}.json`);
  }

  async get(key: string): Promise<Snapshot | undefined> {
    if (this.cache.has(key)) {
      return this.cache.get(key);
    }
    const snapshot = await this.load(key);
    this.cache.set(key, snapshot);
    return snapshot;
  }

  async commit(key: string, snapshot: Snapshot): Promise<void> {
    try {
      await writeJsonFileAtomic(this.fileFor(key), snapshot);
    } catch (error) {
      throw new CommitError(`failed to persist state for ${key}`, {
        cause: error,
      });
    }
    this.cache.set(key, snapshot);
  }

  private async load(key: string): Promise<Snapshot | undefined> {
    const file = this.fileFor(key);
    let raw: unknown;
    try {
      raw = await readJsonFile(file);
    } catch (error) {
      logger.warn(
        `Unreadable state file ${file}, starting from a new baseline`,
        { subscription: key },
        { eventType: LogEvent.DIFF_ERROR, error: serializeError(error) }
      );
      return undefined;
    }
    if (raw === undefined) {
      return undefined;
    }

    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(
        `Malformed state file ${file}, starting from a new baseline`,
        { subscription: key },
        { eventType: LogEvent.DIFF_ERROR, issues: parsed.error.issues.length }
      );
      return undefined;
    }
    return parsed.data;
  }
}
