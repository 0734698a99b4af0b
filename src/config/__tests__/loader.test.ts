/**
 * Configuration loader tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../utils';
import { loadConfig, resolveConfig } from '../loader';

const ENV = { TELEGRAM_BOT_TOKEN: 'test-secret' };

function baseConfig(): Record<string, unknown> {
  return {
    interval: '1min',
    platform: { telegram: { token_env: 'TELEGRAM_BOT_TOKEN' } },
    notify: {
      chat: { platform: 'telegram', id: 1234, thread_id: 114 },
    },
    subscription: {
      someone: [
        {
          platform: { name: 'bilibili.live', user_id: 1 },
          interval: '30s',
          notify: ['chat', { to: 'chat', thread_id: 514 }],
        },
      ],
    },
  };
}

function issuesOf(raw: unknown, env: Record<string, string> = ENV): string[] {
  try {
    resolveConfig(raw, env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('resolveConfig', () => {
  it('設定ファイルを解決する', () => {
    const config = resolveConfig(baseConfig(), ENV);

    expect(config.interval).toBe(60_000);
    expect(config.state).toEqual({ seenCap: 500 });
    expect(config.telegram).toEqual({ token: 'test-secret' });
    expect(config.targets.get('chat')).toEqual({
      name: 'chat',
      channel: 'telegram',
      config: { id: 1234, thread_id: 114 },
    });
    expect(config.subscriptions).toEqual([
      {
        key: 'someone@live.bilibili.com:1',
        name: 'someone',
        platform: { name: 'bilibili.live', userId: 1 },
        interval: 30_000,
        detect: { liveOffline: false, liveTitle: false },
        notify: [
          { target: 'chat', overrides: {} },
          { target: 'chat', overrides: { thread_id: 514 } },
        ],
      },
    ]);
  });

  it('ref は to の別名として使える', () => {
    const raw = baseConfig();
    raw.subscription = {
      someone: [
        { platform: { name: 'bilibili.live', user_id: 1 }, notify: [{ ref: 'chat', thread_id: 7 }] },
      ],
    };

    expect(resolveConfig(raw, ENV).subscriptions[0].notify).toEqual([
      { target: 'chat', overrides: { thread_id: 7 } },
    ]);
  });

  it('アカウントと Twitter の購読を解決する', () => {
    const raw = {
      platform: {
        accounts: {
          main: { platform: 'twitter', cookies_env: 'TWITTER_COOKIES', bearer_token: 'test-bearer' },
        },
      },
      notify: { ops: { platform: 'console' } },
      subscription: {
        someone: [
          {
            platform: { name: 'twitter', username: 'someone', account: 'main' },
            detect: { live_title: true },
            notify: ['ops'],
          },
        ],
      },
    };

    const config = resolveConfig(raw, { TWITTER_COOKIES: 'ct0=test-csrf' });

    expect(config.accounts).toEqual([
      {
        name: 'main',
        platform: 'twitter',
        credentials: { cookies: 'ct0=test-csrf', bearerToken: 'test-bearer' },
      },
    ]);
    expect(config.subscriptions[0]).toMatchObject({
      key: 'someone@twitter:someone',
      platform: { name: 'twitter', username: 'someone', account: 'main' },
      detect: { liveOffline: false, liveTitle: true },
    });
    expect(config.subscriptions[0].interval).toBeUndefined();
  });

  it('動画シリーズの購読を解決する', () => {
    const raw = {
      notify: { ops: { platform: 'console' } },
      subscription: {
        someone: [
          {
            platform: { name: 'bilibili.video', user_id: 100, series_id: 2000 },
            notify: ['ops'],
          },
        ],
      },
    };

    const [subscription] = resolveConfig(raw, {}).subscriptions;

    expect(subscription).toMatchObject({
      key: 'someone@space.bilibili.com:100/series/2000',
      platform: { name: 'bilibili.video', userId: 100, seriesId: 2000 },
    });
    expect(
      issuesOf({
        ...raw,
        subscription: {
          someone: [{ platform: { name: 'bilibili.video', user_id: 100 } }],
        },
      })
    ).toEqual(['subscription.someone.0.platform.series_id: Required']);
  });

  it('_env で終わるキーは環境変数から解決する', () => {
    const raw = {
      notify: { chat: { platform: 'telegram', id: 1, token_env: 'CHAT_TOKEN' } },
    };

    const config = resolveConfig(raw, { CHAT_TOKEN: 'test-secret' });

    expect(config.targets.get('chat')?.config).toEqual({ id: 1, token: 'test-secret' });
  });

  describe('検証エラー', () => {
    it('存在しない配信先を参照すると ConfigError', () => {
      const raw = baseConfig();
      raw.subscription = {
        someone: [{ platform: { name: 'bilibili.live', user_id: 1 }, notify: ['nope'] }],
      };

      expect(issuesOf(raw)).toEqual([
        "subscription.someone[0]: unknown notify target 'nope'",
      ]);
    });

    it('上書き後の設定がチャネルのスキーマに合わなければ ConfigError', () => {
      const raw = baseConfig();
      raw.subscription = {
        someone: [
          {
            platform: { name: 'bilibili.live', user_id: 1 },
            notify: [{ to: 'chat', thread_id: 'x' }],
          },
        ],
      };

      expect(issuesOf(raw)).toEqual([
        "subscription.someone[0]: notify target 'chat': thread_id: Expected number, received string",
      ]);
    });

    it('未知のフィールドを含む上書きは ConfigError', () => {
      const raw = baseConfig();
      raw.subscription = {
        someone: [
          {
            platform: { name: 'bilibili.live', user_id: 1 },
            notify: [{ to: 'chat', colour: 'red' }],
          },
        ],
      };

      expect(issuesOf(raw)).toEqual([
        "subscription.someone[0]: notify target 'chat': (root): Unrecognized key(s) in object: 'colour'",
      ]);
    });

    it('環境変数がなければ ConfigError', () => {
      expect(issuesOf(baseConfig(), {})).toContain(
        'platform.telegram.token: environment variable TELEGRAM_BOT_TOKEN is not set'
      );
    });

    it('Twitter の購読にはアカウントが必要', () => {
      const raw = baseConfig();
      raw.subscription = {
        someone: [{ platform: { name: 'twitter', username: 'someone' }, notify: ['chat'] }],
      };

      expect(issuesOf(raw)).toEqual([
        'subscription.someone[0]: twitter subscriptions need an account',
      ]);
    });

    it('プラットフォームの違うアカウントは使えない', () => {
      const raw = baseConfig();
      raw.platform = {
        telegram: { token: 'test-secret' },
        accounts: { main: { platform: 'bilibili.space', cookies: 'SESSDATA=test' } },
      };
      raw.subscription = {
        someone: [
          { platform: { name: 'twitter', username: 'someone', account: 'main' }, notify: ['chat'] },
        ],
      };

      expect(issuesOf(raw)).toEqual([
        "subscription.someone[0]: account 'main' is a bilibili.space account, not twitter",
      ]);
    });

    it('同じ購読の重複は ConfigError', () => {
      const raw = baseConfig();
      raw.subscription = {
        someone: [
          { platform: { name: 'bilibili.live', user_id: 1 } },
          { platform: { name: 'bilibili.live', user_id: 1 } },
        ],
      };

      expect(issuesOf(raw)).toEqual([
        'subscription.someone[1]: duplicate subscription someone@live.bilibili.com:1',
      ]);
    });

    it('不正な間隔は ConfigError', () => {
      const raw = baseConfig();
      raw.interval = 'soon';

      expect(issuesOf(raw)).toEqual(["interval: invalid duration 'soon'"]);
    });

    it('0ms に丸まる間隔やタイマーの上限を超える間隔は ConfigError', () => {
      const raw = baseConfig();
      raw.interval = '0.4ms';
      expect(issuesOf(raw)).toEqual(["interval: duration '0.4ms' must be at least 1ms"]);

      const long = baseConfig();
      long.subscription = {
        someone: [{ platform: { name: 'bilibili.live', user_id: 1 }, interval: '30d' }],
      };
      expect(issuesOf(long)).toEqual([
        "subscription.someone.0.interval: duration '30d' exceeds 2147483647ms",
      ]);

      const heartbeat = baseConfig();
      heartbeat.reporter = {
        heartbeat: { url: 'https://status.example.com/ping', interval: '25d' },
      };
      expect(issuesOf(heartbeat)).toEqual([
        "reporter.heartbeat.interval: duration '25d' exceeds 2147483647ms",
      ]);
    });

    it('Slack の配信先には Slack のトークンが必要', () => {
      const raw = baseConfig();
      raw.notify = { team: { platform: 'slack', channel: '#general' } };
      raw.subscription = {};

      expect(issuesOf(raw)).toEqual([
        'notify.team: slack targets need platform.slack bot_token and app_token',
      ]);
    });

    it('Telegram のトークンがどこにもなければ ConfigError', () => {
      const raw = baseConfig();
      raw.platform = {};
      raw.subscription = {};

      expect(issuesOf(raw)).toEqual([
        "notify.chat: notify target 'chat' has no telegram token and platform.telegram sets none",
      ]);
    });

    it('ログレポーターの参照も検証する', () => {
      const raw = baseConfig();
      raw.reporter = { log: { notify: ['ops'] } };

      expect(issuesOf(raw)).toEqual(["reporter.log: unknown notify target 'ops'"]);
    });
  });
});

describe('loadConfig', () => {
  it('ファイルから読み込む', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'statuscast-config-'));
    try {
      const file = path.join(dir, 'statuscast.json');
      await writeFile(file, JSON.stringify(baseConfig()), 'utf-8');

      const config = await loadConfig(file, ENV);
      expect(config.subscriptions).toHaveLength(1);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('同梱のサンプル設定を読み込める', async () => {
    const config = await loadConfig(path.join(__dirname, '..', '..', '..', 'statuscast.example.json'), {
      TELEGRAM_BOT_TOKEN: 'test-secret',
      SLACK_BOT_TOKEN: 'test-bot-token',
      SLACK_APP_TOKEN: 'test-app-token',
      TWITTER_COOKIES: 'auth_token=test; ct0=test',
      TWITTER_BEARER_TOKEN: 'test-bearer',
    });

    expect(config.interval).toBe(60_000);
    expect(config.state).toEqual({ directory: 'state', seenCap: 500 });
    expect(config.reporter.heartbeat).toEqual({
      url: 'https://status.example.com/ping/statuscast',
      interval: 300_000,
    });
    expect(config.slack).toEqual({ botToken: 'test-bot-token', appToken: 'test-app-token' });
    expect(config.subscriptions.map((s) => [s.key, s.interval])).toEqual([
      ['someone@live.bilibili.com:1234567', undefined],
      ['someone@space.bilibili.com:1234567', 180_000],
      ['someone@twitter:someone', 120_000],
    ]);
  });

  it('読めないファイルは ConfigError', async () => {
    await expect(
      loadConfig(path.join(os.tmpdir(), 'statuscast-missing', 'none.json'), ENV)
    ).rejects.toBeInstanceOf(ConfigError);
  });
});
