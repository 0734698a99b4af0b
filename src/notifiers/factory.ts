/**
 * Notifier factory - creates one channel per kind used by the configuration
 */

import type { AppConfig } from '../config/types';
import { getLogger, LogEvent, type LogMetadata } from '../utils';
import { ConsoleNotifier } from './console';
import { SlackNotifier } from './slack';
import { TelegramNotifier } from './telegram';
import type { ChannelKind, ChannelRegistry, NotificationChannel } from './types';

const logger = getLogger('NotifierFactory');

/**
 * Create the channels that at least one notify target uses
 */
export function createChannels(
  config: Pick<AppConfig, 'targets' | 'telegram' | 'slack'>
): ChannelRegistry {
  const used = new Set<ChannelKind>();
  for (const target of config.targets.values()) {
    used.add(target.channel);
  }

  const channels: ChannelRegistry = {};
  if (used.has('telegram')) {
    channels.telegram = new TelegramNotifier({
      defaultToken: config.telegram.token,
    });
  }
  if (used.has('slack')) {
    if (config.slack) {
      channels.slack = new SlackNotifier(config.slack);
    } else {
      logger.warn('Slack targets configured but Slack tokens are missing');
    }
  }
  if (used.has('console')) {
    channels.console = new ConsoleNotifier();
  }

  const metadata: LogMetadata = {
    eventType: LogEvent.CHANNEL_LIFECYCLE,
    channels: [...used],
  };
  logger.debug('Notification channels created', undefined, metadata);
  return channels;
}

export function listChannels(channels: ChannelRegistry): NotificationChannel[] {
  const list: NotificationChannel[] = [];
  if (channels.telegram) list.push(channels.telegram);
  if (channels.slack) list.push(channels.slack);
  if (channels.console) list.push(channels.console);
  return list;
}
