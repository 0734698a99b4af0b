/**
 * Application assembly - wires configuration to adapters, store, router,
 * channels, scheduler and reporters
 */

import { AccountPool } from './accounts';
import type { AppConfig } from './config';
import {
  type ChannelRegistry,
  createChannels,
  listChannels,
} from './notifiers';
import { HeartbeatReporter, LogReporter } from './reporter';
import { NotificationRouter } from './router';
import { type AdapterRegistry, createAdapters } from './sources';
import { JsonFileStateStore, MemoryStateStore, type StateStore } from './state';
import {
  errorMessage,
  getLogger,
  LogEvent,
  type LogMetadata,
} from './utils';
import {
  DEFAULT_STOP_GRACE_MS,
  runCycle,
  SubscriptionScheduler,
  type SubscriptionState,
} from './watcher';

const logger = getLogger('App');

export interface AppOverrides {
  adapters?: AdapterRegistry;
  channels?: ChannelRegistry;
  store?: StateStore;
}

export class StatuscastApp {
  readonly router: NotificationRouter;
  readonly store: StateStore;
  private channels: ChannelRegistry;
  private scheduler: SubscriptionScheduler;
  private logReporter?: LogReporter;
  private heartbeat?: HeartbeatReporter;
  private started = false;

  constructor(config: AppConfig, overrides: AppOverrides = {}) {
    const adapters = overrides.adapters ?? createAdapters();
    const accounts = new AccountPool(config.accounts);
    this.store =
      overrides.store ??
      (config.state.directory
        ? new JsonFileStateStore(config.state.directory)
        : new MemoryStateStore());
    this.channels = overrides.channels ?? createChannels(config);
    this.router = new NotificationRouter(config.targets, this.channels);

    const deps = {
      adapters,
      accounts,
      store: this.store,
      router: this.router,
      seenCap: config.state.seenCap,
    };
    this.scheduler = new SubscriptionScheduler(
      config.subscriptions,
      config.interval,
      (subscription, signal) => runCycle(deps, subscription, signal)
    );

    if (config.reporter.log) {
      this.logReporter = new LogReporter(this.router, config.reporter.log.notify);
    }
    if (config.reporter.heartbeat) {
      this.heartbeat = new HeartbeatReporter(config.reporter.heartbeat);
    }
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;
    await Promise.all(listChannels(this.channels).map((channel) => channel.start()));
    this.logReporter?.start();
    this.heartbeat?.start();
    this.scheduler.start();
  }

  async stop(graceMs: number = DEFAULT_STOP_GRACE_MS): Promise<void> {
    if (!this.started) {
      return;
    }
    this.started = false;
    await this.scheduler.stop(graceMs);
    await this.heartbeat?.stop();
    await this.logReporter?.stop();

    const channels = listChannels(this.channels);
    const results = await Promise.allSettled(channels.map((channel) => channel.stop()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const metadata: LogMetadata = {
          eventType: LogEvent.CHANNEL_LIFECYCLE,
          error: errorMessage(result.reason),
        };
        logger.warn(`Failed to stop ${channels[index].kind} channel`, undefined, metadata);
      }
    });
  }

  getStates(): SubscriptionState[] {
    return this.scheduler.getStates();
  }
}
