/**
 * In-memory state store (process lifetime)
 */

import type { Snapshot } from '../sources';
import type { StateStore } from './types';

export class MemoryStateStore implements StateStore {
  private snapshots = new Map<string, Snapshot>();

  async get(key: string): Promise<Snapshot | undefined> {
    return this.snapshots.get(key);
  }

  async commit(key: string, snapshot: Snapshot): Promise<void> {
    this.snapshots.set(key, snapshot);
  }

  get size(): number {
    return this.snapshots.size;
  }
}
