/**
 * Watcher module
 *
 * Schedules subscriptions and runs their fetch, diff, commit and route cycles.
 */

export { type CycleDeps, runCycle } from './executor';
export { DEFAULT_STOP_GRACE_MS, SubscriptionScheduler } from './scheduler';
export type {
  CycleOutcome,
  CycleRunner,
  EventRouter,
  SubscriptionState,
} from './types';
