/**
 * Change-detection engine
 *
 * Pure: compares the last committed snapshot of a subscription with a freshly
 * fetched one and returns the events plus the snapshot to commit.
 */

import type {
  FeedItem,
  FeedSnapshot,
  LiveSnapshot,
  Snapshot,
  SnapshotKind,
} from '../sources';
import { snapshotSchema } from '../sources';
import { DiffError } from '../utils';
import type {
  ChangeEvent,
  DetectionResult,
  DetectOptions,
} from './types';

export const DEFAULT_SEEN_CAP = 500;

export interface DetectSubject {
  /** Subscription key */
  key: string;
  /** Followed person's display name */
  name: string;
  /** Platform display name */
  platform: string;
  /** Snapshot kind the subscription's platform produces */
  snapshotKind: SnapshotKind;
  detect: DetectOptions;
}

export interface DetectParams {
  now?: Date;
  seenCap?: number;
}

function validate(snapshot: unknown, which: string): Snapshot {
  const result = snapshotSchema.safeParse(snapshot);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DiffError(`malformed ${which} snapshot: ${issues}`);
  }
  return result.data;
}

/**
 * Keep at most `cap` ids (never fewer than the ids of the current page),
 * evicting the oldest ids that are not on the current page.
 */
export function capSeen(
  ids: readonly string[],
  cap: number,
  page: readonly FeedItem[]
): string[] {
  const onPage = new Set(page.map((item) => item.id));
  const limit = Math.max(cap, onPage.size);
  const excess = ids.length - limit;
  if (excess <= 0) {
    return [...ids];
  }
  let dropped = 0;
  return ids.filter((id) => {
    if (dropped < excess && !onPage.has(id)) {
      dropped++;
      return false;
    }
    return true;
  });
}

function uniqueIds(items: readonly FeedItem[]): string[] {
  return [...new Set(items.map((item) => item.id))];
}

function diffLive(
  subject: DetectSubject,
  previous: LiveSnapshot,
  current: LiveSnapshot,
  now: Date
): ChangeEvent[] {
  const base = {
    subscription: subject.key,
    name: subject.name,
    platform: subject.platform,
    detectedAt: now,
  };

  if (!previous.online && current.online) {
    return [{ ...base, kind: 'LiveStarted', payload: { live: current } }];
  }
  if (previous.online && !current.online) {
    return subject.detect.liveOffline
      ? [{ ...base, kind: 'LiveEnded', payload: { live: current, previous } }]
      : [];
  }
  if (previous.title !== current.title && subject.detect.liveTitle) {
    return [
      {
        ...base,
        kind: 'LiveTitleChanged',
        payload: { live: current, previousTitle: previous.title },
      },
    ];
  }
  return [];
}

function diffFeed(
  subject: DetectSubject,
  previous: FeedSnapshot,
  current: FeedSnapshot,
  now: Date,
  seenCap: number
): { events: ChangeEvent[]; next: FeedSnapshot } {
  const seen = new Set(previous.seen);
  const fresh: FeedItem[] = [];
  for (const item of current.items) {
    if (!seen.has(item.id)) {
      seen.add(item.id);
      fresh.push(item);
    }
  }

  const events = fresh.map((item): ChangeEvent => ({
    subscription: subject.key,
    name: subject.name,
    platform: subject.platform,
    detectedAt: now,
    kind: 'NewItem',
    payload: { item },
  }));

  // An empty page is a platform glitch more often than a wiped feed
  const items = current.items.length > 0 ? current.items : previous.items;
  const next: FeedSnapshot = {
    kind: 'feed',
    items,
    seen: capSeen(
      [...previous.seen, ...fresh.map((item) => item.id)],
      seenCap,
      current.items
    ),
  };
  return { events, next };
}

/**
 * Compare `previous` (last committed, or undefined) with `current`.
 *
 * @throws DiffError when either snapshot is malformed, or its kind does not
 * match the subscription's platform.
 */
export function detectChanges(
  subject: DetectSubject,
  previous: Snapshot | undefined,
  current: Snapshot,
  params: DetectParams = {}
): DetectionResult {
  const now = params.now ?? new Date();
  const seenCap = params.seenCap ?? DEFAULT_SEEN_CAP;

  const fresh = validate(current, 'fetched');
  if (fresh.kind !== subject.snapshotKind) {
    throw new DiffError(
      `expected a ${subject.snapshotKind} snapshot from ${subject.platform}, got ${fresh.kind}`
    );
  }

  if (previous === undefined) {
    const next: Snapshot =
      fresh.kind === 'feed'
        ? {
            kind: 'feed',
            items: fresh.items,
            seen: capSeen(uniqueIds(fresh.items), seenCap, fresh.items),
          }
        : fresh;
    return { events: [], next, baseline: true };
  }

  const stored = validate(previous, 'stored');
  if (stored.kind === 'live' && fresh.kind === 'live') {
    return {
      events: diffLive(subject, stored, fresh, now),
      next: fresh,
      baseline: false,
    };
  }
  if (stored.kind === 'feed' && fresh.kind === 'feed') {
    return {
      ...diffFeed(subject, stored, fresh, now, seenCap),
      baseline: false,
    };
  }
  throw new DiffError(
    `stored ${stored.kind} snapshot cannot be compared with a ${fresh.kind} snapshot`
  );
}
