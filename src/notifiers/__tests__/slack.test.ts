/**
 * SlackNotifier tests (Bolt is mocked)
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DeliveryError } from '../../utils';
import { SlackNotifier } from '../slack';

const bolt = vi.hoisted(() => {
  const options: unknown[] = [];
  return {
    options,
    postMessage: vi.fn(),
    start: vi.fn(),
    stop: vi.fn(),
  };
});

vi.mock('@slack/bolt', () => ({
  App: class {
    client = { chat: { postMessage: bolt.postMessage } };
    start = bolt.start;
    stop = bolt.stop;
    constructor(options: unknown) {
      bolt.options.push(options);
    }
  },
  LogLevel: { WARN: 'warn', INFO: 'info' },
}));

const notifications = { liveOnline: true, liveTitle: true, post: true, log: true };

describe('SlackNotifier', () => {
  beforeEach(() => {
    bolt.options.length = 0;
    bolt.postMessage.mockReset();
    bolt.start.mockReset();
    bolt.stop.mockReset();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('Socket Mode の App を作る', () => {
    new SlackNotifier({ botToken: 'test-bot-token', appToken: 'test-app-token' });

    expect(bolt.options).toHaveLength(1);
    expect(bolt.options[0]).toMatchObject({
      token: 'test-bot-token',
      appToken: 'test-app-token',
      socketMode: true,
    });
  });

  it('chat.postMessage で mrkdwn を送る', async () => {
    bolt.postMessage.mockResolvedValue({ ok: true, ts: '1700000000.000100' });
    const notifier = new SlackNotifier({ botToken: 'test-bot-token', appToken: 'test-app-token' });

    await notifier.deliver({ channel: 'C123', notifications }, '*hi*');

    expect(bolt.postMessage).toHaveBeenCalledWith({
      channel: 'C123',
      text: '*hi*',
      mrkdwn: true,
    });
  });

  it('送信失敗は DeliveryError', async () => {
    bolt.postMessage.mockRejectedValue(new Error('An API error occurred: not_in_channel'));
    const notifier = new SlackNotifier({ botToken: 'test-bot-token', appToken: 'test-app-token' });

    const error = await notifier
      .deliver({ channel: 'C123', notifications }, 'hi')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeliveryError);
    expect(error).toHaveProperty(
      'message',
      'slack postMessage to C123 failed: An API error occurred: not_in_channel'
    );
  });

  it('start の失敗はそのまま投げ直す', async () => {
    bolt.start.mockRejectedValue(new Error('invalid_auth'));
    const notifier = new SlackNotifier({ botToken: 'test-bot-token', appToken: 'test-app-token' });

    await expect(notifier.start()).rejects.toThrow('invalid_auth');
  });
});
