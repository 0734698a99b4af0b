/**
 * Change-detection engine tests
 */

import { describe, it, expect } from 'vitest';
import type { FeedSnapshot, LiveSnapshot, Snapshot } from '../../sources';
import { DiffError } from '../../utils';
import { capSeen, detectChanges, type DetectSubject } from '../engine';
import { DEFAULT_DETECT_OPTIONS, type ChangeEvent, type DetectOptions } from '../types';

const NOW = new Date('2024-05-01T12:00:00Z');

function liveSubject(detect: DetectOptions = DEFAULT_DETECT_OPTIONS): DetectSubject {
  return {
    key: 'someone@live.bilibili.com:1',
    name: 'someone',
    platform: 'bilibili live',
    snapshotKind: 'live',
    detect,
  };
}

const feedSubject: DetectSubject = {
  key: 'someone@space.bilibili.com:1',
  name: 'someone',
  platform: 'bilibili',
  snapshotKind: 'feed',
  detect: DEFAULT_DETECT_OPTIONS,
};

function live(online: boolean, title = 'ゲーム配信'): LiveSnapshot {
  return {
    kind: 'live',
    online,
    title,
    streamer: 'someone',
    url: 'https://live.bilibili.com/100',
  };
}

function feed(ids: string[], seen: string[] = []): FeedSnapshot {
  return {
    kind: 'feed',
    items: ids.map((id) => ({
      id,
      url: `https://t.bilibili.com/${id}`,
      text: `post ${id}`,
    })),
    seen,
  };
}

// Feed a sequence of snapshots through the engine, committing every result
function replay(subject: DetectSubject, snapshots: Snapshot[]): ChangeEvent[][] {
  let previous: Snapshot | undefined;
  return snapshots.map((current) => {
    const result = detectChanges(subject, previous, current, { now: NOW });
    previous = result.next;
    return result.events;
  });
}

describe('detectChanges', () => {
  describe('ベースライン', () => {
    it('初回のスナップショットではイベントを出さない', () => {
      const result = detectChanges(liveSubject(), undefined, live(true));

      expect(result.events).toEqual([]);
      expect(result.baseline).toBe(true);
      expect(result.next).toEqual(live(true));
    });

    it('フィードの初回は全IDを既読として記録する', () => {
      const result = detectChanges(feedSubject, undefined, feed(['1', '2', '3']));

      expect(result.events).toEqual([]);
      expect(result.next).toEqual(feed(['1', '2', '3'], ['1', '2', '3']));
    });
  });

  describe('ライブ状態', () => {
    it('offline, offline, online, online, offline で LiveStarted が1回だけ出る', () => {
      const events = replay(liveSubject(), [
        live(false),
        live(false),
        live(true),
        live(true),
        live(false),
      ]);

      expect(events.map((e) => e.length)).toEqual([0, 0, 1, 0, 0]);
      expect(events[2][0]).toEqual({
        subscription: 'someone@live.bilibili.com:1',
        name: 'someone',
        platform: 'bilibili live',
        detectedAt: NOW,
        kind: 'LiveStarted',
        payload: { live: live(true) },
      });
    });

    it('liveOffline が有効なら LiveEnded も出る', () => {
      const events = replay(liveSubject({ liveOffline: true, liveTitle: false }), [
        live(false),
        live(true),
        live(false),
      ]);

      expect(events.flat().map((e) => e.kind)).toEqual(['LiveStarted', 'LiveEnded']);
    });

    it('liveTitle が有効なときだけタイトル変更を通知する', () => {
      const snapshots = [live(true, '雑談'), live(true, '歌枠')];

      expect(replay(liveSubject(), snapshots).flat()).toEqual([]);

      const events = replay(
        liveSubject({ liveOffline: false, liveTitle: true }),
        snapshots
      ).flat();
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        kind: 'LiveTitleChanged',
        payload: { previousTitle: '雑談', live: { title: '歌枠' } },
      });
    });

    it('配信開始と同時のタイトル変更は LiveStarted だけになる', () => {
      const events = replay(liveSubject({ liveOffline: true, liveTitle: true }), [
        live(false, '前回'),
        live(true, '今回'),
      ]).flat();

      expect(events.map((e) => e.kind)).toEqual(['LiveStarted']);
    });
  });

  describe('フィード', () => {
    it('{1,2,3} の後に {2,3,4,5} なら 4, 5 の順で通知する', () => {
      const events = replay(feedSubject, [feed(['1', '2', '3']), feed(['2', '3', '4', '5'])]);

      const ids = events[1].map((e) => (e.kind === 'NewItem' ? e.payload.item.id : ''));
      expect(ids).toEqual(['4', '5']);
    });

    it('コミット済みのスナップショットを再処理しても通知しない', () => {
      const first = detectChanges(feedSubject, undefined, feed(['1', '2']));
      const second = detectChanges(feedSubject, first.next, feed(['1', '2', '3']));
      const again = detectChanges(feedSubject, second.next, feed(['1', '2', '3']));

      expect(second.events).toHaveLength(1);
      expect(again.events).toEqual([]);
      expect(again.next).toEqual(second.next);
    });

    it('コミット前にクラッシュしたら次回同じイベントを再検出する', () => {
      const committed = detectChanges(feedSubject, undefined, feed(['1'])).next;

      const lost = detectChanges(feedSubject, committed, feed(['1', '2']));
      const retried = detectChanges(feedSubject, committed, feed(['1', '2']));

      expect(lost.events).toHaveLength(1);
      expect(retried.events).toEqual(lost.events);
    });

    it('空のページでは既読マーカーを減らさない', () => {
      const previous = feed(['1', '2'], ['1', '2']);
      const result = detectChanges(feedSubject, previous, feed([]));

      expect(result.events).toEqual([]);
      expect(result.next).toEqual(previous);
    });

    it('同じページ内の重複IDは1回だけ通知する', () => {
      const result = detectChanges(feedSubject, feed(['1'], ['1']), feed(['1', '2', '2']));

      expect(result.events).toHaveLength(1);
      expect(result.next.kind === 'feed' && result.next.seen).toEqual(['1', '2']);
    });

    it('既読マーカーは上限を超えると古いものから消える', () => {
      const result = detectChanges(
        feedSubject,
        feed(['1', '2', '3'], ['1', '2', '3']),
        feed(['3', '4']),
        { seenCap: 3 }
      );

      expect(result.next.kind === 'feed' && result.next.seen).toEqual(['2', '3', '4']);
    });
  });

  describe('エラー', () => {
    it('プラットフォームと種類が違うスナップショットは DiffError', () => {
      expect(() => detectChanges(feedSubject, undefined, live(true))).toThrow(DiffError);
    });

    it('保存済みと種類が違う場合は DiffError', () => {
      expect(() => detectChanges(feedSubject, live(false), feed(['1']))).toThrow(
        'stored live snapshot cannot be compared with a feed snapshot'
      );
    });

    it('空のIDを持つアイテムは DiffError', () => {
      expect(() => detectChanges(feedSubject, undefined, feed(['']))).toThrow(DiffError);
    });
  });
});

describe('capSeen', () => {
  const page = (ids: string[]) => feed(ids).items;

  it('現在のページにあるIDは上限を超えても残す', () => {
    expect(capSeen(['a', 'b', 'c', 'd'], 2, page(['a', 'd']))).toEqual(['a', 'd']);
  });

  it('上限はページの件数を下回らない', () => {
    expect(capSeen(['a', 'b', 'c'], 1, page(['a', 'b', 'c']))).toEqual(['a', 'b', 'c']);
  });

  it('上限以内ならそのまま返す', () => {
    expect(capSeen(['a', 'b'], 5, page([]))).toEqual(['a', 'b']);
  });
});
