/**
 * Notifiers module
 *
 * Notification channels delivering rendered messages to external services:
 * - Telegram (Bot API, HTML)
 * - Slack (via Bolt framework with Socket Mode, mrkdwn)
 * - Console (plain text through the logger)
 */

export { ConsoleNotifier } from './console';
export { createChannels, listChannels } from './factory';
export { CHANNEL_KINDS, parseTargetConfig } from './schemas';
export { SlackNotifier, type SlackNotifierConfig } from './slack';
export {
  TELEGRAM_API_BASE,
  TelegramNotifier,
  type TelegramNotifierConfig,
} from './telegram';
export type {
  ChannelKind,
  ChannelRegistry,
  ConsoleTargetConfig,
  MessageFormat,
  NotificationChannel,
  NotificationToggles,
  ResolvedTarget,
  SlackTargetConfig,
  TargetConfigOf,
  TelegramTargetConfig,
} from './types';
