/**
 * Subscription scheduler
 *
 * One setTimeout chain per subscription. The first tick fires right after
 * start; later ticks are due `interval` after the previous tick, whether or
 * not its cycle has finished. A tick that finds the previous cycle still
 * running is skipped, never queued.
 */

import type { Subscription } from '../config/types';
import {
  CommitError,
  DiffError,
  errorMessage,
  FetchError,
  formatDuration,
  getLogger,
  LogEvent,
  type LogMetadata,
  MAX_DURATION_MS,
  serializeError,
} from '../utils';
import type { CycleRunner, SubscriptionState } from './types';

const logger = getLogger('Scheduler');

export const DEFAULT_STOP_GRACE_MS = 10 * 1000;

function logCycleFailure(key: string, error: unknown): void {
  const context = { subscription: key };
  const base = { error: serializeError(error) };
  if (error instanceof FetchError) {
    const metadata: LogMetadata = { eventType: LogEvent.FETCH_ERROR, ...base };
    logger.warn(`Fetch failed: ${error.message}`, context, metadata);
  } else if (error instanceof DiffError) {
    const metadata: LogMetadata = { eventType: LogEvent.DIFF_ERROR, ...base };
    logger.warn(`Snapshot rejected: ${error.message}`, context, metadata);
  } else if (error instanceof CommitError) {
    const metadata: LogMetadata = { eventType: LogEvent.COMMIT_ERROR, ...base };
    logger.error(`Commit failed: ${error.message}`, context, metadata);
  } else {
    const metadata: LogMetadata = { eventType: LogEvent.CYCLE_ERROR, ...base };
    logger.error(`Cycle failed: ${errorMessage(error)}`, context, metadata);
  }
}

export class SubscriptionScheduler {
  private subscriptions = new Map<string, Subscription>();
  private states = new Map<string, SubscriptionState>();
  private timers = new Map<string, NodeJS.Timeout>();
  private inFlight = new Map<string, Promise<void>>();
  private controller = new AbortController();
  private running = false;
  private onTick: CycleRunner;

  constructor(
    subscriptions: Subscription[],
    globalIntervalMs: number,
    onTick: CycleRunner
  ) {
    this.onTick = onTick;
    for (const subscription of subscriptions) {
      const intervalMs = subscription.interval ?? globalIntervalMs;
      if (!Number.isInteger(intervalMs) || intervalMs < 1 || intervalMs > MAX_DURATION_MS) {
        throw new RangeError(
          `interval of ${subscription.key} must be an integer between 1 and ${MAX_DURATION_MS}ms, got ${intervalMs}`
        );
      }
      this.subscriptions.set(subscription.key, subscription);
      this.states.set(subscription.key, {
        key: subscription.key,
        intervalMs,
        nextDueMs: Number.NaN,
        running: false,
        runs: 0,
        skippedTicks: 0,
        consecutiveFailures: 0,
      });
    }
  }

  /**
   * Create and start a scheduler in one call
   */
  static run(
    subscriptions: Subscription[],
    globalIntervalMs: number,
    onTick: CycleRunner
  ): SubscriptionScheduler {
    const scheduler = new SubscriptionScheduler(
      subscriptions,
      globalIntervalMs,
      onTick
    );
    scheduler.start();
    return scheduler;
  }

  /**
   * Start the scheduler
   */
  start(): void {
    if (this.running) {
      logger.warn('Scheduler already running');
      return;
    }
    if (this.controller.signal.aborted) {
      this.controller = new AbortController();
    }

    this.running = true;
    const now = Date.now();
    for (const state of this.states.values()) {
      state.nextDueMs = now;
      this.arm(state.key, 0);
    }
    logger.info(`Watching ${this.states.size} subscription(s)`);
  }

  /**
   * Stop ticking, abort in-flight cycles and wait up to `graceMs` for them
   */
  async stop(graceMs: number = DEFAULT_STOP_GRACE_MS): Promise<void> {
    if (!this.running) {
      return;
    }

    this.running = false;
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.controller.abort();

    const pending = [...this.inFlight.values()];
    if (pending.length > 0) {
      logger.info(`Waiting for ${pending.length} running cycle(s)`);
      let graceTimer: NodeJS.Timeout | undefined;
      const settled = await Promise.race([
        Promise.allSettled(pending).then(() => true),
        new Promise<boolean>((resolve) => {
          graceTimer = setTimeout(() => resolve(false), graceMs);
        }),
      ]);
      clearTimeout(graceTimer);
      if (!settled) {
        logger.warn(
          `${this.inFlight.size} cycle(s) still running after ${formatDuration(graceMs)}`
        );
      }
    }
    logger.info('Stopped subscription scheduler');
  }

  private arm(key: string, delay: number): void {
    this.timers.set(
      key,
      setTimeout(() => this.tick(key), delay)
    );
  }

  private tick(key: string): void {
    const state = this.states.get(key);
    const subscription = this.subscriptions.get(key);
    if (!this.running || !state || !subscription) {
      return;
    }

    state.nextDueMs = Date.now() + state.intervalMs;
    this.arm(key, state.intervalMs);

    if (state.running) {
      state.skippedTicks++;
      logger.debug(
        'Previous cycle still running, tick skipped',
        { subscription: key },
        { eventType: LogEvent.TICK_SKIPPED, skippedTicks: state.skippedTicks }
      );
      return;
    }

    state.running = true;
    const cycle = this.execute(subscription, state).finally(() => {
      state.running = false;
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, cycle);
  }

  private async execute(
    subscription: Subscription,
    state: SubscriptionState
  ): Promise<void> {
    try {
      await this.onTick(subscription, this.controller.signal);
      state.consecutiveFailures = 0;
      state.lastError = undefined;
    } catch (error) {
      state.consecutiveFailures++;
      state.lastError = errorMessage(error);
      logCycleFailure(subscription.key, error);
    } finally {
      state.runs++;
      state.lastRunAt = new Date();
    }
  }

  /**
   * Get current state of all subscriptions (for debugging)
   */
  getStates(): SubscriptionState[] {
    return Array.from(this.states.values(), (state) => ({ ...state }));
  }
}
