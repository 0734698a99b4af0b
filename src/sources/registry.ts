/**
 * Adapter registry - one adapter per platform kind
 */

import { BilibiliLiveAdapter } from './bilibili-live';
import { BilibiliSpaceAdapter } from './bilibili-space';
import { BilibiliVideoAdapter } from './bilibili-video';
import { TwitterAdapter } from './twitter';
import type {
  PlatformAccount,
  PlatformAdapter,
  PlatformName,
  PlatformSpec,
  Snapshot,
} from './types';

export type AdapterRegistry = {
  [N in PlatformName]: PlatformAdapter<N>;
};

export function createAdapters(): AdapterRegistry {
  return {
    'bilibili.live': new BilibiliLiveAdapter(),
    'bilibili.space': new BilibiliSpaceAdapter(),
    'bilibili.video': new BilibiliVideoAdapter(),
    twitter: new TwitterAdapter(),
  };
}

export function adapterFor(
  registry: AdapterRegistry,
  spec: PlatformSpec
): PlatformAdapter {
  return registry[spec.name];
}

/**
 * Dispatch a fetch to the adapter of the spec's platform
 */
export function fetchSnapshot(
  registry: AdapterRegistry,
  spec: PlatformSpec,
  account?: PlatformAccount
): Promise<Snapshot> {
  switch (spec.name) {
    case 'bilibili.live':
      return registry['bilibili.live'].fetch(spec, account);
    case 'bilibili.space':
      return registry['bilibili.space'].fetch(spec, account);
    case 'bilibili.video':
      return registry['bilibili.video'].fetch(spec);
    case 'twitter':
      return registry.twitter.fetch(spec, account);
  }
}
