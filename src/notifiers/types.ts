/**
 * Notification channel interface for delivering rendered messages
 */

import type { ChangeEvent } from '../detect';

export type ChannelKind = 'telegram' | 'slack' | 'console';

/** Markup a channel understands */
export type MessageFormat = 'plain' | 'html' | 'mrkdwn';

/** Which event kinds reach a target (all enabled by default) */
export interface NotificationToggles {
  liveOnline: boolean;
  liveTitle: boolean;
  post: boolean;
  log: boolean;
}

export interface TargetConfigBase {
  notifications: NotificationToggles;
}

export interface TelegramTargetConfig extends TargetConfigBase {
  /** Numeric chat id or `@username` */
  chatId: number | string;
  threadId?: number;
  /** Bot token for this target; falls back to the global one */
  token?: string;
}

export interface SlackTargetConfig extends TargetConfigBase {
  /** Channel ID or name */
  channel: string;
}

export type ConsoleTargetConfig = TargetConfigBase;

export type ResolvedTarget =
  | { kind: 'telegram'; config: TelegramTargetConfig }
  | { kind: 'slack'; config: SlackTargetConfig }
  | { kind: 'console'; config: ConsoleTargetConfig };

export type TargetConfigOf<K extends ChannelKind> = Extract<
  ResolvedTarget,
  { kind: K }
>['config'];

export interface NotificationChannel<K extends ChannelKind = ChannelKind> {
  readonly kind: K;
  readonly format: MessageFormat;

  /**
   * Deliver a rendered body using the target's resolved configuration.
   * `event` is what `body` was rendered from, for channels that keep
   * per-event state.
   * @throws DeliveryError
   */
  deliver(config: TargetConfigOf<K>, body: string, event: ChangeEvent): Promise<void>;

  /**
   * Initialize the channel (connect, authenticate, etc.)
   */
  start(): Promise<void>;

  /**
   * Cleanup resources (disconnect, etc.)
   */
  stop(): Promise<void>;
}

/** At most one channel instance per kind */
export type ChannelRegistry = {
  [K in ChannelKind]?: NotificationChannel<K>;
};
