/**
 * State store interface
 */

import type { Snapshot } from '../sources';

export interface StateStore {
  /**
   * Last committed snapshot for `key`, or undefined before the first commit
   */
  get(key: string): Promise<Snapshot | undefined>;

  /**
   * Replace the snapshot for `key`. Either fully applied or not at all.
   * @throws CommitError
   */
  commit(key: string, snapshot: Snapshot): Promise<void>;
}
