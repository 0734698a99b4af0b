/**
 * Platform adapter interface and the snapshots it produces
 */

// Platform specs (closed set, keyed by `name`)

export interface BilibiliLiveSpec {
  name: 'bilibili.live';
  userId: number;
}

export interface BilibiliSpaceSpec {
  name: 'bilibili.space';
  userId: number;
  account?: string;
}

export interface BilibiliVideoSpec {
  name: 'bilibili.video';
  userId: number;
  seriesId: number;
}

export interface TwitterSpec {
  name: 'twitter';
  username: string;
  account: string;
}

export type PlatformSpec =
  | BilibiliLiveSpec
  | BilibiliSpaceSpec
  | BilibiliVideoSpec
  | TwitterSpec;
export type PlatformName = PlatformSpec['name'];

export type SpecOf<N extends PlatformName> = Extract<PlatformSpec, { name: N }>;

// Snapshots (JSON-serialisable, persisted by the state store)

export interface LiveSnapshot {
  kind: 'live';
  online: boolean;
  title: string;
  streamer: string;
  url: string;
  startedAt?: string; // ISO 8601
  coverUrl?: string;
  profileUrl?: string;
}

export interface FeedItem {
  id: string;
  url: string;
  text: string;
  publishedAt?: string; // ISO 8601
  author?: string;
  pinned?: boolean;
  repostOf?: {
    author?: string;
    text: string;
    url?: string;
  };
}

export interface FeedSnapshot {
  kind: 'feed';
  /** Items of the latest page, oldest first */
  items: FeedItem[];
  /** Already-notified item ids, oldest first, size-capped */
  seen: string[];
}

export type Snapshot = LiveSnapshot | FeedSnapshot;
export type SnapshotKind = Snapshot['kind'];

// Accounts

export interface AccountCredentials {
  cookies?: string;
  bearerToken?: string;
}

export interface PlatformAccount {
  name: string;
  platform: PlatformName;
  credentials: AccountCredentials;
}

/**
 * Translates one platform's wire protocol into snapshots.
 * Must be safe to call concurrently for different specs; calls sharing an
 * account are serialised by the caller.
 */
export interface PlatformAdapter<N extends PlatformName = PlatformName> {
  readonly platform: N;
  /** Human readable platform name used in messages */
  readonly displayName: string;
  /** Snapshot kind this platform produces */
  readonly snapshotKind: SnapshotKind;

  fetch(spec: SpecOf<N>, account?: PlatformAccount): Promise<Snapshot>;
}

export function describeSpec(spec: PlatformSpec): string {
  switch (spec.name) {
    case 'bilibili.live':
      return `live.bilibili.com:${spec.userId}`;
    case 'bilibili.space':
      return `space.bilibili.com:${spec.userId}`;
    case 'bilibili.video':
      return `space.bilibili.com:${spec.userId}/series/${spec.seriesId}`;
    case 'twitter':
      return `twitter:${spec.username}`;
  }
}

export function accountOf(spec: PlatformSpec): string | undefined {
  switch (spec.name) {
    case 'bilibili.live':
    case 'bilibili.video':
      return undefined;
    case 'bilibili.space':
    case 'twitter':
      return spec.account;
  }
}
