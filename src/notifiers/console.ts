/**
 * Console notifier - outputs messages to stdout
 */

import { getLogger } from '../utils';
import type { ConsoleTargetConfig, NotificationChannel } from './types';

const logger = getLogger('ConsoleNotifier');

export class ConsoleNotifier implements NotificationChannel<'console'> {
  readonly kind = 'console' as const;
  readonly format = 'plain' as const;

  async deliver(_config: ConsoleTargetConfig, body: string): Promise<void> {
    const box = '='.repeat(60);
    logger.info(`\n${box}\n${body}\n${box}`);
  }

  async start(): Promise<void> {
    logger.info('Console notifier ready');
  }

  async stop(): Promise<void> {
    logger.debug('Console notifier stopped');
  }
}
