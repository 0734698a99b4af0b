/**
 * bilibili video series (a user's named playlist of uploads)
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { FetchError } from '../utils';
import { sortOldestFirst } from './feed';
import { createHttpClient, parseResponse, toFetchError } from './http';
import type {
  BilibiliVideoSpec,
  FeedItem,
  FeedSnapshot,
  PlatformAdapter,
} from './types';

const SERIES_ARCHIVES_API = 'https://api.bilibili.com/x/series/archives';

const archiveSchema = z.object({
  aid: z.number(),
  bvid: z.string().min(1),
  title: z.string(),
  pic: z.string().optional(),
  pubdate: z.number().optional(),
});

const responseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z
    .object({
      archives: z.array(archiveSchema).nullish(),
    })
    .nullish(),
});

export class BilibiliVideoAdapter implements PlatformAdapter<'bilibili.video'> {
  readonly platform = 'bilibili.video' as const;
  readonly displayName = 'bilibili video';
  readonly snapshotKind = 'feed' as const;

  private http: AxiosInstance;

  constructor(http: AxiosInstance = createHttpClient()) {
    this.http = http;
  }

  async fetch(spec: BilibiliVideoSpec): Promise<FeedSnapshot> {
    let body: unknown;
    try {
      const response = await this.http.get(SERIES_ARCHIVES_API, {
        params: { mid: spec.userId, series_id: spec.seriesId },
      });
      body = response.data;
    } catch (error) {
      throw toFetchError(error, 'bilibili series request');
    }

    const parsed = parseResponse(responseSchema, body, 'bilibili series');
    if (parsed.code !== 0) {
      throw new FetchError(
        `bilibili series returned code ${parsed.code}: ${parsed.message ?? 'no message'}`
      );
    }

    const items = (parsed.data?.archives ?? []).map((archive): FeedItem => {
      const item: FeedItem = {
        id: archive.bvid,
        url: `https://www.bilibili.com/video/${archive.bvid}`,
        text: archive.title,
      };
      if (archive.pubdate) {
        item.publishedAt = new Date(archive.pubdate * 1000).toISOString();
      }
      return item;
    });

    return { kind: 'feed', items: sortOldestFirst(items), seen: [] };
  }
}
