/**
 * bilibili space dynamics (posts, videos, articles) of a user
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { FetchError } from '../utils';
import { sortOldestFirst } from './feed';
import { createHttpClient, parseResponse, toFetchError } from './http';
import type {
  BilibiliSpaceSpec,
  FeedItem,
  FeedSnapshot,
  PlatformAccount,
  PlatformAdapter,
} from './types';

const SPACE_FEED_API =
  'https://api.bilibili.com/x/polymer/web-dynamic/v1/feed/space';

const richTextSchema = z.object({ text: z.string() }).nullish();

const majorSchema = z
  .object({
    type: z.string(),
    archive: z
      .object({ title: z.string(), jump_url: z.string().optional() })
      .optional(),
    opus: z
      .object({
        title: z.string().nullish(),
        summary: richTextSchema,
      })
      .optional(),
    article: z.object({ title: z.string() }).optional(),
  })
  .nullish();

const baseItemSchema = z.object({
  id_str: z.string().nullable(),
  modules: z.object({
    module_author: z.object({
      name: z.string(),
      pub_ts: z.union([z.number(), z.string()]).optional(),
    }),
    module_dynamic: z
      .object({ desc: richTextSchema, major: majorSchema })
      .nullish(),
    module_tag: z.object({ text: z.string() }).optional(),
  }),
});

const itemSchema = baseItemSchema.extend({
  orig: baseItemSchema.optional(),
});

const responseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z
    .object({
      items: z.array(itemSchema),
    })
    .nullish(),
});

type SpaceItem = z.infer<typeof baseItemSchema>;

const PINNED_TAG = '置顶';

function itemText(item: SpaceItem): string {
  const dynamic = item.modules.module_dynamic;
  const parts: string[] = [];
  if (dynamic?.desc?.text) {
    parts.push(dynamic.desc.text);
  }
  const major = dynamic?.major;
  if (major?.archive) {
    parts.push(major.archive.title);
  } else if (major?.opus) {
    if (major.opus.title) parts.push(major.opus.title);
    if (major.opus.summary?.text && major.opus.summary.text !== dynamic?.desc?.text) {
      parts.push(major.opus.summary.text);
    }
  } else if (major?.article) {
    parts.push(major.article.title);
  }
  return parts.join('\n');
}

function publishedAt(item: SpaceItem): string | undefined {
  const ts = Number(item.modules.module_author.pub_ts);
  return ts > 0 ? new Date(ts * 1000).toISOString() : undefined;
}

function itemUrl(id: string): string {
  return `https://t.bilibili.com/${id}`;
}

export class BilibiliSpaceAdapter implements PlatformAdapter<'bilibili.space'> {
  readonly platform = 'bilibili.space' as const;
  readonly displayName = 'bilibili';
  readonly snapshotKind = 'feed' as const;

  private http: AxiosInstance;

  constructor(http: AxiosInstance = createHttpClient()) {
    this.http = http;
  }

  async fetch(
    spec: BilibiliSpaceSpec,
    account?: PlatformAccount
  ): Promise<FeedSnapshot> {
    let body: unknown;
    try {
      const response = await this.http.get(SPACE_FEED_API, {
        params: { host_mid: spec.userId },
        headers: account?.credentials.cookies
          ? { Cookie: account.credentials.cookies }
          : undefined,
      });
      body = response.data;
    } catch (error) {
      throw toFetchError(error, 'bilibili space request');
    }

    const parsed = parseResponse(responseSchema, body, 'bilibili space');
    if (parsed.code !== 0) {
      throw new FetchError(
        `bilibili space returned code ${parsed.code}: ${parsed.message ?? 'no message'}`
      );
    }

    const items: FeedItem[] = [];
    for (const raw of parsed.data?.items ?? []) {
      if (!raw.id_str) {
        continue;
      }
      const item: FeedItem = {
        id: raw.id_str,
        url: itemUrl(raw.id_str),
        text: itemText(raw),
        author: raw.modules.module_author.name,
      };
      const published = publishedAt(raw);
      if (published) item.publishedAt = published;
      if (raw.modules.module_tag?.text === PINNED_TAG) item.pinned = true;
      if (raw.orig) {
        item.repostOf = {
          author: raw.orig.modules.module_author.name,
          text: itemText(raw.orig),
          ...(raw.orig.id_str ? { url: itemUrl(raw.orig.id_str) } : {}),
        };
      }
      items.push(item);
    }

    return { kind: 'feed', items: sortOldestFirst(items), seen: [] };
  }
}
