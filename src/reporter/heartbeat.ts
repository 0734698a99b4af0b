/**
 * Heartbeat reporter - pings a URL every interval so an external monitor
 * notices when the process stops
 */

import axios, { type AxiosInstance } from 'axios';
import type { HeartbeatConfig } from '../config/types';
import {
  errorMessage,
  formatDuration,
  getLogger,
  LogEvent,
  type LogMetadata,
} from '../utils';

const logger = getLogger('Heartbeat');

export class HeartbeatReporter {
  private config: HeartbeatConfig;
  private http: AxiosInstance;
  private timer?: NodeJS.Timeout;
  private inFlight?: Promise<boolean>;
  private running = false;

  constructor(config: HeartbeatConfig, http?: AxiosInstance) {
    this.config = config;
    this.http = http ?? axios.create({ timeout: 30 * 1000 });
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    logger.info(
      `Pinging ${this.config.url} every ${formatDuration(this.config.interval)}`
    );
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
  }

  /**
   * Send one heartbeat. Resolves to false on failure; never rejects.
   */
  async ping(): Promise<boolean> {
    try {
      await this.http.get(this.config.url);
      logger.debug('Heartbeat sent');
      return true;
    } catch (error) {
      const metadata: LogMetadata = {
        eventType: LogEvent.HEARTBEAT_ERROR,
        error: errorMessage(error),
      };
      logger.warn(`Heartbeat to ${this.config.url} failed`, undefined, metadata);
      return false;
    }
  }

  private schedule(delay: number): void {
    this.timer = setTimeout(() => {
      if (!this.running) {
        return;
      }
      this.schedule(this.config.interval);
      this.inFlight = this.ping();
    }, delay);
  }
}
