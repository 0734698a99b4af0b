/**
 * Event rendering tests
 */

import { describe, it, expect } from 'vitest';
import type { ChangeEvent, LiveStartedEvent } from '../../detect';
import type { FeedItem } from '../../sources';
import { renderEvent, renderLiveSummary } from '../render';

const NOW = new Date('2024-05-01T12:00:00Z');

const liveStarted: LiveStartedEvent = {
  subscription: 'A&B@live.bilibili.com:1',
  name: 'A&B',
  platform: 'bilibili live',
  detectedAt: NOW,
  kind: 'LiveStarted',
  payload: {
    live: {
      kind: 'live',
      online: true,
      title: '<歌枠>',
      streamer: 'A&B',
      url: 'https://live.bilibili.com/100',
    },
  },
};

function newItem(item: FeedItem): ChangeEvent {
  return {
    subscription: 'someone@space.bilibili.com:1',
    name: 'someone',
    platform: 'bilibili',
    detectedAt: NOW,
    kind: 'NewItem',
    payload: { item },
  };
}

describe('renderEvent', () => {
  describe('LiveStarted', () => {
    it('HTML ではエスケープしてリンクにする', () => {
      expect(renderEvent(liveStarted, 'html')).toBe(
        '🔴 <b>A&amp;B</b> is live on bilibili live\n<a href="https://live.bilibili.com/100">&lt;歌枠&gt;</a>'
      );
    });

    it('mrkdwn では Slack 形式のリンクにする', () => {
      expect(renderEvent(liveStarted, 'mrkdwn')).toBe(
        '🔴 *A&amp;B* is live on bilibili live\n<https://live.bilibili.com/100|&lt;歌枠&gt;>'
      );
    });

    it('plain ではそのまま出力する', () => {
      expect(renderEvent(liveStarted, 'plain')).toBe(
        '🔴 A&B is live on bilibili live\n<歌枠> https://live.bilibili.com/100'
      );
    });
  });

  it('タイトル変更は前後のタイトルを含む', () => {
    const event: ChangeEvent = {
      ...liveStarted,
      name: 'someone',
      kind: 'LiveTitleChanged',
      payload: {
        live: { ...liveStarted.payload.live, title: '雑談' },
        previousTitle: '歌枠',
      },
    };

    expect(renderEvent(event, 'plain')).toBe(
      '✏️ someone changed the live title on bilibili live\n歌枠 → 雑談\nhttps://live.bilibili.com/100'
    );
  });

  it('固定された投稿には (pinned) を付ける', () => {
    const body = renderEvent(
      newItem({
        id: '7',
        url: 'https://t.bilibili.com/7',
        text: 'お知らせ',
        pinned: true,
      }),
      'plain'
    );

    expect(body).toBe(
      '📝 someone posted on bilibili (pinned)\nお知らせ\nhttps://t.bilibili.com/7'
    );
  });

  it('リポストは元の投稿を引用する', () => {
    const body = renderEvent(
      newItem({
        id: '9',
        url: 'https://t.bilibili.com/9',
        text: '見て',
        author: 'someone',
        repostOf: { author: 'other', text: '元の投稿\n\n二行目' },
      }),
      'plain'
    );

    expect(body).toBe(
      '🔁 someone reposted from other on bilibili\n見て\n> 元の投稿\n> 二行目\nhttps://t.bilibili.com/9'
    );
  });

  it('ログはレベルとサブシステムを表示する', () => {
    const event: ChangeEvent = {
      subscription: 'statuscast:Scheduler',
      name: 'statuscast:Scheduler',
      platform: 'log',
      detectedAt: NOW,
      kind: 'Log',
      payload: { level: 'WARN', message: 'Fetch failed' },
    };

    expect(renderEvent(event, 'html')).toBe(
      '<b>[WARN]</b> statuscast:Scheduler\nFetch failed'
    );
  });
});

describe('renderLiveSummary', () => {
  const subject = { name: 'someone', platform: 'bilibili live' };
  const live = liveStarted.payload.live;

  it('配信中はタイトルの履歴を新しい順に並べる', () => {
    expect(renderLiveSummary(subject, { ...live, title: '雑談' }, ['雑談', '歌枠'], 'html')).toBe(
      '🔴 <b>someone</b> is live on bilibili live\n<a href="https://live.bilibili.com/100">雑談 ⬅️ 歌枠</a>'
    );
  });

  it('配信終了後はオフラインの見出しにする', () => {
    expect(renderLiveSummary(subject, { ...live, online: false }, ['歌枠'], 'plain')).toBe(
      '⚫ someone went offline on bilibili live\n歌枠 https://live.bilibili.com/100'
    );
  });

  it('タイトルがなければ URL をラベルにする', () => {
    expect(renderLiveSummary(subject, live, [''], 'mrkdwn')).toBe(
      '🔴 *someone* is live on bilibili live\n<https://live.bilibili.com/100|https://live.bilibili.com/100>'
    );
  });
});
