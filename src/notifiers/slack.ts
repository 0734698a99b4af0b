/**
 * Slack notifier using Bolt framework with Socket Mode
 */

import { App, LogLevel } from '@slack/bolt';
import { DeliveryError, errorMessage, getLogger } from '../utils';
import type { NotificationChannel, SlackTargetConfig } from './types';

const logger = getLogger('SlackNotifier');

export interface SlackNotifierConfig {
  botToken: string; // xoxb-...
  appToken: string; // xapp-...
}

export class SlackNotifier implements NotificationChannel<'slack'> {
  readonly kind = 'slack' as const;
  readonly format = 'mrkdwn' as const;

  private app: App;

  constructor(config: SlackNotifierConfig) {
    this.app = new App({
      token: config.botToken,
      appToken: config.appToken,
      socketMode: true,
      logLevel:
        process.env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.INFO,
    });
  }

  async deliver(config: SlackTargetConfig, body: string): Promise<void> {
    try {
      const result = await this.app.client.chat.postMessage({
        channel: config.channel,
        text: body,
        mrkdwn: true,
      });
      logger.debug(`Message sent to Slack channel ${config.channel}`, undefined, {
        ts: result.ts,
      });
    } catch (error) {
      throw new DeliveryError(
        `slack postMessage to ${config.channel} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async start(): Promise<void> {
    try {
      logger.info('Starting Slack Bolt app (Socket Mode)...');
      // In Socket Mode app.start() connects via WebSocket instead of listening
      await this.app.start();
      logger.success('Slack Bolt app connected via Socket Mode');
    } catch (error) {
      logger.error('Failed to start Slack Bolt app', undefined, {
        error: errorMessage(error),
      });
      throw error;
    }
  }

  async stop(): Promise<void> {
    try {
      logger.info('Stopping Slack Bolt app...');
      await this.app.stop();
      logger.info('Slack Bolt app stopped');
    } catch (error) {
      logger.error('Failed to stop Slack Bolt app', undefined, {
        error: errorMessage(error),
      });
      throw error;
    }
  }
}
