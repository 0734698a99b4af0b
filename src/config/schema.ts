/**
 * Configuration file schema (JSON, snake_case keys)
 */

import { z } from 'zod';
import { CHANNEL_KINDS } from '../notifiers/schemas';
import { errorMessage, parseDuration } from '../utils';

export const durationSchema = z.string().transform((value, ctx) => {
  try {
    return parseDuration(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(error) });
    return z.NEVER;
  }
});

const accountSchema = z
  .object({
    platform: z.enum(['bilibili.space', 'twitter']),
    cookies: z.string().optional(),
    cookies_env: z.string().optional(),
    bearer_token: z.string().optional(),
    bearer_token_env: z.string().optional(),
  })
  .strict();

const platformSpecSchema = z.discriminatedUnion('name', [
  z
    .object({
      name: z.literal('bilibili.live'),
      user_id: z.number().int().positive(),
    })
    .strict(),
  z
    .object({
      name: z.literal('bilibili.space'),
      user_id: z.number().int().positive(),
      account: z.string().optional(),
    })
    .strict(),
  z
    .object({
      name: z.literal('bilibili.video'),
      user_id: z.number().int().positive(),
      series_id: z.number().int().positive(),
    })
    .strict(),
  z
    .object({
      name: z.literal('twitter'),
      username: z.string().min(1),
      account: z.string().optional(),
    })
    .strict(),
]);

/** `"name"` or `{ "to": "name", ...overrides }` (`ref` is an alias of `to`) */
export const notifyRefSchema = z.union([
  z.string().min(1),
  z
    .object({ to: z.string().min(1).optional(), ref: z.string().min(1).optional() })
    .catchall(z.unknown()),
]);

const notifyTargetSchema = z
  .object({ platform: z.enum(CHANNEL_KINDS) })
  .catchall(z.unknown());

const subscriptionSchema = z
  .object({
    platform: platformSpecSchema,
    interval: durationSchema.optional(),
    detect: z
      .object({
        live_offline: z.boolean().default(false),
        live_title: z.boolean().default(false),
      })
      .strict()
      .default({}),
    notify: z.array(notifyRefSchema).default([]),
  })
  .strict();

export const configFileSchema = z
  .object({
    interval: durationSchema.default('1min'),
    state: z
      .object({
        directory: z.string().min(1).optional(),
        seen_cap: z.number().int().positive().default(500),
      })
      .strict()
      .default({}),
    reporter: z
      .object({
        log: z
          .object({ notify: z.array(notifyRefSchema).min(1) })
          .strict()
          .optional(),
        heartbeat: z
          .object({
            url: z.string().url(),
            interval: durationSchema.default('1min'),
          })
          .strict()
          .optional(),
      })
      .strict()
      .default({}),
    platform: z
      .object({
        telegram: z
          .object({
            token: z.string().optional(),
            token_env: z.string().optional(),
          })
          .strict()
          .optional(),
        slack: z
          .object({
            bot_token: z.string().optional(),
            bot_token_env: z.string().optional(),
            app_token: z.string().optional(),
            app_token_env: z.string().optional(),
          })
          .strict()
          .optional(),
        accounts: z.record(accountSchema).default({}),
      })
      .strict()
      .default({}),
    notify: z.record(notifyTargetSchema).default({}),
    subscription: z.record(z.array(subscriptionSchema)).default({}),
  })
  .strict();

export type ConfigFile = z.output<typeof configFileSchema>;
export type RawNotifyRef = z.output<typeof notifyRefSchema>;
export type RawPlatformSpec = z.output<typeof platformSpecSchema>;
