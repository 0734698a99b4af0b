/**
 * Notification router
 *
 * Fans each change event out to the subscription's notify targets. Events go
 * out one after another in detection order; the deliveries of one event run
 * concurrently and fail independently.
 */

import type { NotifyRef, NotifyTarget, Subscription } from '../config/types';
import type { ChangeEvent, ChangeKind } from '../detect';
import type {
  ChannelRegistry,
  MessageFormat,
  NotificationToggles,
  ResolvedTarget,
} from '../notifiers/types';
import {
  DeliveryError,
  errorMessage,
  getLogger,
  LogEvent,
  type LogMetadata,
  serializeError,
} from '../utils';
import { renderEvent } from './render';
import { resolveNotifyRef } from './resolve';

const logger = getLogger('Router');

export interface DeliveryReport {
  target: string;
  kind: ChangeKind;
  ok: boolean;
  error?: string;
}

const TOGGLE_OF: Record<ChangeKind, keyof NotificationToggles> = {
  LiveStarted: 'liveOnline',
  LiveEnded: 'liveOnline',
  LiveTitleChanged: 'liveTitle',
  NewItem: 'post',
  Log: 'log',
};

interface BoundTarget {
  format: MessageFormat;
  send(body: string, event: ChangeEvent): Promise<void>;
}

export class NotificationRouter {
  private targets: Map<string, NotifyTarget>;
  private channels: ChannelRegistry;

  constructor(targets: Map<string, NotifyTarget>, channels: ChannelRegistry) {
    this.targets = targets;
    this.channels = channels;
  }

  /**
   * Deliver `events` (in order) to every notify target of `subscription`
   */
  async route(
    subscription: Pick<Subscription, 'key' | 'notify'>,
    events: ChangeEvent[]
  ): Promise<DeliveryReport[]> {
    return this.routeToRefs(subscription.notify, events, subscription.key);
  }

  /**
   * Deliver `events` (in order) to an explicit list of refs
   */
  async routeToRefs(
    refs: NotifyRef[],
    events: ChangeEvent[],
    source?: string
  ): Promise<DeliveryReport[]> {
    const reports: DeliveryReport[] = [];
    for (const event of events) {
      const settled = await Promise.allSettled(
        refs.map((ref) => this.deliver(event, ref, source))
      );
      settled.forEach((result, index) => {
        if (result.status === 'fulfilled') {
          if (result.value) reports.push(result.value);
        } else {
          reports.push({
            target: refs[index].target,
            kind: event.kind,
            ok: false,
            error: errorMessage(result.reason),
          });
        }
      });
    }
    return reports;
  }

  private bind(resolved: ResolvedTarget): BoundTarget | undefined {
    switch (resolved.kind) {
      case 'telegram': {
        const channel = this.channels.telegram;
        const config = resolved.config;
        return channel
          ? { format: channel.format, send: (body, event) => channel.deliver(config, body, event) }
          : undefined;
      }
      case 'slack': {
        const channel = this.channels.slack;
        const config = resolved.config;
        return channel
          ? { format: channel.format, send: (body, event) => channel.deliver(config, body, event) }
          : undefined;
      }
      case 'console': {
        const channel = this.channels.console;
        const config = resolved.config;
        return channel
          ? { format: channel.format, send: (body, event) => channel.deliver(config, body, event) }
          : undefined;
      }
    }
  }

  /**
   * One delivery attempt. Resolves to undefined when the target's toggles
   * filter the event out; never rejects.
   */
  private async deliver(
    event: ChangeEvent,
    ref: NotifyRef,
    source: string | undefined
  ): Promise<DeliveryReport | undefined> {
    const context = { subscription: source, target: ref.target };
    try {
      const target = this.targets.get(ref.target);
      if (!target) {
        throw new DeliveryError(`unknown notify target '${ref.target}'`);
      }
      const resolved = resolveNotifyRef(target, ref);
      if (!resolved.config.notifications[TOGGLE_OF[event.kind]]) {
        logger.debug(`${event.kind} disabled for target, skipped`, context);
        return undefined;
      }

      const bound = this.bind(resolved);
      if (!bound) {
        throw new DeliveryError(`no ${resolved.kind} channel is running`);
      }
      await bound.send(renderEvent(event, bound.format), event);

      const metadata: LogMetadata = {
        eventType: LogEvent.NOTIFICATION_SENT,
        kind: event.kind,
      };
      logger.info(`Delivered ${event.kind}`, context, metadata);
      return { target: ref.target, kind: event.kind, ok: true };
    } catch (error) {
      const metadata: LogMetadata = {
        eventType: LogEvent.DELIVERY_ERROR,
        kind: event.kind,
        error: serializeError(error),
      };
      logger.error(`Failed to deliver ${event.kind}`, context, metadata);
      return {
        target: ref.target,
        kind: event.kind,
        ok: false,
        error: errorMessage(error),
      };
    }
  }
}
