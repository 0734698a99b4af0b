/**
 * Watcher related types
 */

import type { Subscription } from '../config/types';
import type { ChangeEvent } from '../detect';
import type { DeliveryReport } from '../router';

export interface SubscriptionState {
  key: string;
  intervalMs: number;
  nextDueMs: number;
  /** A cycle is in flight */
  running: boolean;
  runs: number;
  skippedTicks: number;
  consecutiveFailures: number;
  lastError?: string;
  lastRunAt?: Date;
}

/** Runs one cycle for a subscription; must honour `signal` before committing */
export type CycleRunner = (
  subscription: Subscription,
  signal: AbortSignal
) => Promise<unknown>;

export interface EventRouter {
  route(
    subscription: Pick<Subscription, 'key' | 'notify'>,
    events: ChangeEvent[]
  ): Promise<DeliveryReport[]>;
}

export interface CycleOutcome {
  status: 'completed' | 'aborted';
  baseline: boolean;
  events: ChangeEvent[];
  reports: DeliveryReport[];
}
