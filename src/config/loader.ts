/**
 * Configuration loading
 *
 * Reads the JSON file, validates it and resolves every cross reference
 * (accounts, notification targets, overrides, secrets). All problems are
 * collected and raised together as one ConfigError.
 */

import { readFile } from 'node:fs/promises';
import type { DetectOptions } from '../detect';
import { resolveNotifyRef } from '../router/resolve';
import {
  accountOf,
  describeSpec,
  type PlatformAccount,
  type PlatformSpec,
} from '../sources';
import { ConfigError, errorMessage } from '../utils';
import {
  type ConfigFile,
  configFileSchema,
  type RawNotifyRef,
  type RawPlatformSpec,
} from './schema';
import type {
  AppConfig,
  Env,
  NotifyRef,
  NotifyTarget,
  Subscription,
} from './types';

const ENV_SUFFIX = '_env';

class Issues {
  readonly list: string[] = [];

  add(where: string, message: string): void {
    this.list.push(`${where}: ${message}`);
  }
}

/**
 * A secret given either literally or through an environment variable
 */
function secret(
  issues: Issues,
  where: string,
  literal: string | undefined,
  envName: string | undefined,
  env: Env
): string | undefined {
  if (literal !== undefined) {
    return literal;
  }
  if (envName === undefined) {
    return undefined;
  }
  const value = env[envName];
  if (!value) {
    issues.add(where, `environment variable ${envName} is not set`);
    return undefined;
  }
  return value;
}

/**
 * Replace every `<key>_env` entry with `<key>` read from the environment
 */
function resolveEnvKeys(
  record: Record<string, unknown>,
  issues: Issues,
  where: string,
  env: Env
): Record<string, unknown> {
  const resolved: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!key.endsWith(ENV_SUFFIX)) {
      resolved[key] = value;
      continue;
    }
    const base = key.slice(0, -ENV_SUFFIX.length);
    if (typeof value !== 'string') {
      issues.add(where, `${key} must name an environment variable`);
      continue;
    }
    const fromEnv = secret(issues, `${where}.${key}`, undefined, value, env);
    if (fromEnv !== undefined && resolved[base] === undefined) {
      resolved[base] = fromEnv;
    }
  }
  return resolved;
}

function toNotifyRef(
  raw: RawNotifyRef,
  issues: Issues,
  where: string,
  env: Env
): NotifyRef | undefined {
  if (typeof raw === 'string') {
    return { target: raw, overrides: {} };
  }
  const { to, ref, ...overrides } = raw;
  const target = to ?? ref;
  if (target === undefined) {
    issues.add(where, 'notify reference needs "to"');
    return undefined;
  }
  return { target, overrides: resolveEnvKeys(overrides, issues, where, env) };
}

function toPlatformSpec(
  raw: RawPlatformSpec,
  issues: Issues,
  where: string
): PlatformSpec | undefined {
  switch (raw.name) {
    case 'bilibili.live':
      return { name: raw.name, userId: raw.user_id };
    case 'bilibili.space':
      return {
        name: raw.name,
        userId: raw.user_id,
        ...(raw.account !== undefined ? { account: raw.account } : {}),
      };
    case 'bilibili.video':
      return { name: raw.name, userId: raw.user_id, seriesId: raw.series_id };
    case 'twitter':
      if (raw.account === undefined) {
        issues.add(where, 'twitter subscriptions need an account');
        return undefined;
      }
      return { name: raw.name, username: raw.username, account: raw.account };
  }
}

function toAccounts(
  file: ConfigFile,
  issues: Issues,
  env: Env
): PlatformAccount[] {
  return Object.entries(file.platform.accounts).map(([name, raw]) => {
    const where = `platform.accounts.${name}`;
    const cookies = secret(
      issues,
      `${where}.cookies`,
      raw.cookies,
      raw.cookies_env,
      env
    );
    const bearerToken = secret(
      issues,
      `${where}.bearer_token`,
      raw.bearer_token,
      raw.bearer_token_env,
      env
    );
    if (raw.platform === 'twitter') {
      if (!cookies && !raw.cookies_env) {
        issues.add(where, 'twitter accounts need cookies');
      }
      if (!bearerToken && !raw.bearer_token_env) {
        issues.add(where, 'twitter accounts need bearer_token');
      }
    }
    return {
      name,
      platform: raw.platform,
      credentials: {
        ...(cookies !== undefined ? { cookies } : {}),
        ...(bearerToken !== undefined ? { bearerToken } : {}),
      },
    };
  });
}

function checkAccount(
  spec: PlatformSpec,
  accounts: Map<string, PlatformAccount>,
  issues: Issues,
  where: string
): void {
  const name = accountOf(spec);
  if (name === undefined) {
    return;
  }
  const account = accounts.get(name);
  if (!account) {
    issues.add(where, `unknown account '${name}'`);
  } else if (account.platform !== spec.name) {
    issues.add(
      where,
      `account '${name}' is a ${account.platform} account, not ${spec.name}`
    );
  }
}

function checkRefs(
  refs: NotifyRef[],
  targets: Map<string, NotifyTarget>,
  telegramToken: string | undefined,
  issues: Issues,
  where: string
): void {
  for (const ref of refs) {
    const target = targets.get(ref.target);
    if (!target) {
      issues.add(where, `unknown notify target '${ref.target}'`);
      continue;
    }
    try {
      const resolved = resolveNotifyRef(target, ref);
      if (
        resolved.kind === 'telegram' &&
        resolved.config.token === undefined &&
        telegramToken === undefined
      ) {
        issues.add(
          where,
          `notify target '${ref.target}' has no telegram token and platform.telegram sets none`
        );
      }
    } catch (error) {
      const details =
        error instanceof ConfigError ? error.issues.join('; ') : errorMessage(error);
      issues.add(where, `notify target '${ref.target}': ${details}`);
    }
  }
}

/**
 * Validate and resolve a parsed configuration document
 * @throws ConfigError
 */
export function resolveConfig(raw: unknown, env: Env = process.env): AppConfig {
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      )
    );
  }
  const file = parsed.data;
  const issues = new Issues();

  const telegramToken = file.platform.telegram
    ? secret(
        issues,
        'platform.telegram.token',
        file.platform.telegram.token,
        file.platform.telegram.token_env,
        env
      )
    : undefined;

  let slack: AppConfig['slack'];
  if (file.platform.slack) {
    const before = issues.list.length;
    const botToken = secret(
      issues,
      'platform.slack.bot_token',
      file.platform.slack.bot_token,
      file.platform.slack.bot_token_env,
      env
    );
    const appToken = secret(
      issues,
      'platform.slack.app_token',
      file.platform.slack.app_token,
      file.platform.slack.app_token_env,
      env
    );
    if (botToken && appToken) {
      slack = { botToken, appToken };
    } else if (issues.list.length === before) {
      issues.add('platform.slack', 'bot_token and app_token are required');
    }
  }

  const accounts = toAccounts(file, issues, env);
  const accountsByName = new Map(accounts.map((a) => [a.name, a]));

  const targets = new Map<string, NotifyTarget>();
  for (const [name, entry] of Object.entries(file.notify)) {
    const { platform: channel, ...config } = entry;
    const target: NotifyTarget = {
      name,
      channel,
      config: resolveEnvKeys(config, issues, `notify.${name}`, env),
    };
    targets.set(name, target);
    if (channel === 'slack' && !file.platform.slack) {
      issues.add(
        `notify.${name}`,
        'slack targets need platform.slack bot_token and app_token'
      );
    }
    // The base config must be valid on its own too
    checkRefs(
      [{ target: name, overrides: {} }],
      targets,
      telegramToken,
      issues,
      `notify.${name}`
    );
  }

  const subscriptions: Subscription[] = [];
  const keys = new Set<string>();
  for (const [name, entries] of Object.entries(file.subscription)) {
    entries.forEach((entry, index) => {
      const where = `subscription.${name}[${index}]`;
      const platform = toPlatformSpec(entry.platform, issues, where);
      if (!platform) {
        return;
      }
      const key = `${name}@${describeSpec(platform)}`;
      if (keys.has(key)) {
        issues.add(where, `duplicate subscription ${key}`);
      }
      keys.add(key);

      checkAccount(platform, accountsByName, issues, where);

      const notify = entry.notify.flatMap((ref, i) => {
        const resolved = toNotifyRef(ref, issues, `${where}.notify[${i}]`, env);
        return resolved ? [resolved] : [];
      });
      checkRefs(notify, targets, telegramToken, issues, where);

      const detect: DetectOptions = {
        liveOffline: entry.detect.live_offline,
        liveTitle: entry.detect.live_title,
      };
      subscriptions.push({
        key,
        name,
        platform,
        ...(entry.interval !== undefined ? { interval: entry.interval } : {}),
        detect,
        notify,
      });
    });
  }

  let logNotify: NotifyRef[] | undefined;
  if (file.reporter.log) {
    logNotify = file.reporter.log.notify.flatMap((ref, i) => {
      const resolved = toNotifyRef(ref, issues, `reporter.log.notify[${i}]`, env);
      return resolved ? [resolved] : [];
    });
    checkRefs(logNotify, targets, telegramToken, issues, 'reporter.log');
  }

  if (issues.list.length > 0) {
    throw new ConfigError(issues.list);
  }

  return {
    interval: file.interval,
    state: {
      ...(file.state.directory !== undefined
        ? { directory: file.state.directory }
        : {}),
      seenCap: file.state.seen_cap,
    },
    reporter: {
      ...(logNotify ? { log: { notify: logNotify } } : {}),
      ...(file.reporter.heartbeat ? { heartbeat: file.reporter.heartbeat } : {}),
    },
    telegram: telegramToken !== undefined ? { token: telegramToken } : {},
    ...(slack ? { slack } : {}),
    accounts,
    targets,
    subscriptions,
  };
}

/**
 * Read, validate and resolve the configuration file at `filePath`
 * @throws ConfigError
 */
export async function loadConfig(
  filePath: string,
  env: Env = process.env
): Promise<AppConfig> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`cannot read ${filePath}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`${filePath} is not valid JSON: ${errorMessage(error)}`);
  }
  return resolveConfig(raw, env);
}
