/**
 * Per-channel target configuration schemas
 *
 * Target configs are written in snake_case in the configuration file. They are
 * validated after NotifyRef overrides have been merged in, so an override can
 * never produce a config its channel does not accept.
 */

import { z } from 'zod';
import { ConfigError } from '../utils';
import type {
  ChannelKind,
  ConsoleTargetConfig,
  NotificationToggles,
  ResolvedTarget,
  SlackTargetConfig,
  TelegramTargetConfig,
} from './types';

export const CHANNEL_KINDS = ['telegram', 'slack', 'console'] as const;

const togglesSchema = z
  .object({
    live_online: z.boolean().default(true),
    live_title: z.boolean().default(true),
    post: z.boolean().default(true),
    log: z.boolean().default(true),
  })
  .strict()
  .default({})
  .transform(
    (t): NotificationToggles => ({
      liveOnline: t.live_online,
      liveTitle: t.live_title,
      post: t.post,
      log: t.log,
    })
  );

const telegramSchema = z
  .object({
    id: z.union([z.number().int(), z.string().min(1)]).optional(),
    username: z.string().min(1).optional(),
    thread_id: z.number().int().positive().optional(),
    token: z.string().min(1).optional(),
    notifications: togglesSchema,
  })
  .strict()
  .transform((c, ctx): TelegramTargetConfig => {
    const chatId =
      c.id ??
      (c.username === undefined
        ? undefined
        : c.username.startsWith('@')
          ? c.username
          : `@${c.username}`);
    if (chatId === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'either id or username is required',
      });
      return z.NEVER;
    }
    return {
      chatId,
      ...(c.thread_id !== undefined ? { threadId: c.thread_id } : {}),
      ...(c.token !== undefined ? { token: c.token } : {}),
      notifications: c.notifications,
    };
  });

const slackSchema = z
  .object({
    channel: z.string().min(1),
    notifications: togglesSchema,
  })
  .strict()
  .transform(
    (c): SlackTargetConfig => ({
      channel: c.channel,
      notifications: c.notifications,
    })
  );

const consoleSchema = z
  .object({ notifications: togglesSchema })
  .strict()
  .transform((c): ConsoleTargetConfig => ({ notifications: c.notifications }));

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map(
    (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
  );
}

function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  config: Record<string, unknown>
): T {
  const result = schema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(issuesOf(result.error));
  }
  return result.data;
}

/**
 * Validate a (merged) target configuration for its channel kind
 * @throws ConfigError listing every problem
 */
export function parseTargetConfig(
  kind: ChannelKind,
  config: Record<string, unknown>
): ResolvedTarget {
  switch (kind) {
    case 'telegram':
      return { kind, config: parseWith(telegramSchema, config) };
    case 'slack':
      return { kind, config: parseWith(slackSchema, config) };
    case 'console':
      return { kind, config: parseWith(consoleSchema, config) };
  }
}
