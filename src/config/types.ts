/**
 * Configuration types (resolved form, after validation)
 */

import type { DetectOptions } from '../detect';
import type { ChannelKind } from '../notifiers/types';
import type { PlatformAccount, PlatformSpec } from '../sources';

/** Reference to a notification target, with per-reference overrides */
export interface NotifyRef {
  target: string;
  /** Shallow-merged over the target's config (snake_case keys) */
  overrides: Record<string, unknown>;
}

export interface NotifyTarget {
  name: string;
  channel: ChannelKind;
  /** Base channel configuration (snake_case keys, secrets resolved) */
  config: Record<string, unknown>;
}

export interface Subscription {
  /** `<name>@<platform description>`, unique, keys the state store */
  key: string;
  /** The followed person */
  name: string;
  platform: PlatformSpec;
  /** Poll interval in ms; falls back to the global interval */
  interval?: number;
  detect: DetectOptions;
  notify: NotifyRef[];
}

export interface StateConfig {
  /** Persist snapshots as JSON files here; in memory when absent */
  directory?: string;
  seenCap: number;
}

export interface HeartbeatConfig {
  url: string;
  interval: number;
}

export interface ReporterConfig {
  log?: { notify: NotifyRef[] };
  heartbeat?: HeartbeatConfig;
}

export interface AppConfig {
  /** Global poll interval in ms */
  interval: number;
  state: StateConfig;
  reporter: ReporterConfig;
  telegram: { token?: string };
  slack?: { botToken: string; appToken: string };
  accounts: PlatformAccount[];
  targets: Map<string, NotifyTarget>;
  subscriptions: Subscription[];
}

export type Env = Record<string, string | undefined>;
