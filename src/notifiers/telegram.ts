/**
 * Telegram notifier using the Bot API (sendMessage, HTML parse mode)
 *
 * The message announcing a live session is remembered per chat, thread and
 * subscription. Title changes edit it to list every title so far (and are
 * also posted as a new message); the end of the session edits it to the
 * offline summary instead of posting.
 */

import axios, { type AxiosInstance, isAxiosError } from 'axios';
import { z } from 'zod';
import type { ChangeEvent } from '../detect';
import { renderLiveSummary } from '../router/render';
import { DeliveryError, getLogger } from '../utils';
import type { NotificationChannel, TelegramTargetConfig } from './types';

const logger = getLogger('TelegramNotifier');

export const TELEGRAM_API_BASE = 'https://api.telegram.org';

const responseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  result: z.object({ message_id: z.number() }).passthrough().optional(),
});

type BotMethod = 'sendMessage' | 'editMessageText';

interface LiveMessage {
  messageId: number;
  /** Newest first */
  titles: string[];
}

export interface TelegramNotifierConfig {
  /** Bot token used by targets that do not carry their own */
  defaultToken?: string;
  apiBase?: string;
  timeout?: number;
}

export class TelegramNotifier implements NotificationChannel<'telegram'> {
  readonly kind = 'telegram' as const;
  readonly format = 'html' as const;

  private http: AxiosInstance;
  private defaultToken?: string;
  private apiBase: string;
  private liveMessages: Map<string, LiveMessage> = new Map();

  constructor(config: TelegramNotifierConfig = {}, http?: AxiosInstance) {
    this.defaultToken = config.defaultToken;
    this.apiBase = config.apiBase ?? TELEGRAM_API_BASE;
    this.http = http ?? axios.create({ timeout: config.timeout ?? 30 * 1000 });
  }

  async deliver(
    config: TelegramTargetConfig,
    body: string,
    event: ChangeEvent
  ): Promise<void> {
    const token = config.token ?? this.defaultToken;
    if (!token) {
      throw new DeliveryError(`no bot token for telegram chat ${config.chatId}`);
    }
    const key = `${config.chatId}:${config.threadId ?? ''}:${event.subscription}`;

    switch (event.kind) {
      case 'LiveStarted': {
        const messageId = await this.send(token, config, body);
        if (messageId !== undefined) {
          this.liveMessages.set(key, { messageId, titles: [event.payload.live.title] });
        }
        return;
      }
      case 'LiveTitleChanged': {
        const message = this.liveMessages.get(key);
        if (message) {
          message.titles.unshift(event.payload.live.title);
          const summary = renderLiveSummary(event, event.payload.live, message.titles, this.format);
          await this.edit(token, config, message.messageId, summary);
        }
        await this.send(token, config, body);
        return;
      }
      case 'LiveEnded': {
        const message = this.liveMessages.get(key);
        if (!message) {
          await this.send(token, config, body);
          return;
        }
        this.liveMessages.delete(key);
        const summary = renderLiveSummary(event, event.payload.live, message.titles, this.format);
        await this.edit(token, config, message.messageId, summary);
        return;
      }
      default:
        await this.send(token, config, body);
    }
  }

  private async send(
    token: string,
    config: TelegramTargetConfig,
    text: string
  ): Promise<number | undefined> {
    const messageId = await this.call(token, 'sendMessage', config.chatId, {
      chat_id: config.chatId,
      text,
      parse_mode: 'HTML',
      ...(config.threadId !== undefined
        ? { message_thread_id: config.threadId }
        : {}),
    });
    logger.debug(`Message sent to Telegram chat ${config.chatId}`, undefined, {
      messageId,
    });
    return messageId;
  }

  private async edit(
    token: string,
    config: TelegramTargetConfig,
    messageId: number,
    text: string
  ): Promise<void> {
    await this.call(token, 'editMessageText', config.chatId, {
      chat_id: config.chatId,
      message_id: messageId,
      text,
      parse_mode: 'HTML',
    });
    logger.debug(`Live message edited in Telegram chat ${config.chatId}`, undefined, {
      messageId,
    });
  }

  private async call(
    token: string,
    method: BotMethod,
    chatId: number | string,
    payload: Record<string, unknown>
  ): Promise<number | undefined> {
    let data: unknown;
    try {
      const response = await this.http.post(`${this.apiBase}/bot${token}/${method}`, payload);
      data = response.data;
    } catch (error) {
      throw new DeliveryError(describeFailure(error, method, chatId), {
        cause: error,
      });
    }

    const parsed = responseSchema.safeParse(data);
    if (!parsed.success || !parsed.data.ok) {
      throw new DeliveryError(
        `telegram rejected message to ${chatId}: ${
          parsed.success
            ? (parsed.data.description ?? 'no description')
            : 'unexpected response'
        }`
      );
    }
    return parsed.data.result?.message_id;
  }

  async start(): Promise<void> {
    logger.info('Telegram notifier ready');
  }

  async stop(): Promise<void> {
    logger.debug('Telegram notifier stopped');
  }
}

// Never include the request URL: it carries the bot token
function describeFailure(
  error: unknown,
  method: BotMethod,
  chatId: number | string
): string {
  if (isAxiosError(error)) {
    const description = responseSchema.safeParse(error.response?.data);
    if (description.success && description.data.description) {
      return `telegram rejected message to ${chatId}: ${description.data.description}`;
    }
    const status = error.response?.status;
    return status
      ? `telegram ${method} to ${chatId} failed with status ${status}`
      : `telegram ${method} to ${chatId} failed: ${error.code ?? 'network error'}`;
  }
  return `telegram ${method} to ${chatId} failed: ${String(error)}`;
}
