/**
 * Log reporter - forwards WARN and ERROR records to notify targets
 */

import type { NotifyRef } from '../config/types';
import type { LogEventRecord } from '../detect';
import type { DeliveryReport } from '../router';
import {
  LogEvent,
  LogLevel,
  type LogRecord,
  logger as rootLogger,
} from '../utils';

export const LOG_REPORTER_SOURCE = 'log-reporter';

/** Records waiting for delivery beyond this are dropped, oldest first */
export const DEFAULT_MAX_BACKLOG = 100;

export interface LogRouter {
  routeToRefs(
    refs: NotifyRef[],
    events: LogEventRecord[],
    source?: string
  ): Promise<DeliveryReport[]>;
}

export class LogReporter {
  private router: LogRouter;
  private refs: NotifyRef[];
  private maxBacklog: number;
  private removeSink?: () => void;
  private backlog: LogEventRecord[] = [];
  private dropped = 0;
  private draining?: Promise<void>;

  constructor(
    router: LogRouter,
    refs: NotifyRef[],
    maxBacklog: number = DEFAULT_MAX_BACKLOG
  ) {
    this.router = router;
    this.refs = refs;
    this.maxBacklog = Math.max(1, maxBacklog);
  }

  start(): void {
    if (this.removeSink) {
      return;
    }
    this.removeSink = rootLogger.addSink((record) => this.onRecord(record));
  }

  /**
   * Detach from the logger and wait for queued forwards
   */
  async stop(): Promise<void> {
    this.removeSink?.();
    this.removeSink = undefined;
    await this.draining;
  }

  private onRecord(record: LogRecord): void {
    if (record.level < LogLevel.WARN) {
      return;
    }
    // Failures of our own deliveries would loop back here
    if (
      record.meta?.eventType === LogEvent.DELIVERY_ERROR ||
      record.context?.subscription === LOG_REPORTER_SOURCE
    ) {
      return;
    }

    this.backlog.push({
      subscription: record.context?.subscription ?? record.subsystem,
      name: record.subsystem,
      platform: 'log',
      detectedAt: record.time,
      kind: 'Log',
      payload: {
        level: LogLevel[record.level],
        message: record.context?.subscription
          ? `${record.context.subscription}: ${record.message}`
          : record.message,
      },
    });
    if (this.backlog.length > this.maxBacklog) {
      this.backlog.shift();
      this.dropped++;
    }
    if (!this.draining) {
      this.draining = this.drain();
    }
  }

  // Forwards one record at a time, in order
  private async drain(): Promise<void> {
    try {
      for (let event = this.backlog.shift(); event; event = this.backlog.shift()) {
        const events = this.dropped > 0 ? [this.droppedNotice(event), event] : [event];
        this.dropped = 0;
        try {
          await this.router.routeToRefs(this.refs, events, LOG_REPORTER_SOURCE);
        } catch (error) {
          console.error(`Failed to forward log record: ${String(error)}`);
        }
      }
    } finally {
      this.draining = undefined;
    }
  }

  private droppedNotice(next: LogEventRecord): LogEventRecord {
    return {
      subscription: LOG_REPORTER_SOURCE,
      name: 'LogReporter',
      platform: 'log',
      detectedAt: next.detectedAt,
      kind: 'Log',
      payload: {
        level: 'WARN',
        message: `${this.dropped} log record(s) dropped while forwarding was backed up`,
      },
    };
  }
}
