/**
 * Sources module
 *
 * Platform adapters turning an external source into snapshots:
 * - bilibili.live (live status by user id)
 * - bilibili.space (post feed by user id)
 * - bilibili.video (video series by user id and series id)
 * - twitter (social feed by handle, through a shared account)
 */

export { BilibiliLiveAdapter } from './bilibili-live';
export { BilibiliSpaceAdapter } from './bilibili-space';
export { BilibiliVideoAdapter } from './bilibili-video';
export { sortOldestFirst } from './feed';
export { createHttpClient } from './http';
export {
  adapterFor,
  type AdapterRegistry,
  createAdapters,
  fetchSnapshot,
} from './registry';
export { snapshotSchema } from './schema';
export { csrfTokenFromCookies, TwitterAdapter } from './twitter';
export { accountOf, describeSpec } from './types';
export type {
  AccountCredentials,
  FeedItem,
  FeedSnapshot,
  LiveSnapshot,
  PlatformAccount,
  PlatformAdapter,
  PlatformName,
  PlatformSpec,
  Snapshot,
  SnapshotKind,
  SpecOf,
} from './types';
