import { z } from 'zod';
import type { FeedSnapshot, LiveSnapshot, Snapshot } from './types';

const liveSnapshotSchema: z.ZodType<LiveSnapshot> = z.object({
  kind: z.literal('live'),
  online: z.boolean(),
  title: z.string(),
  streamer: z.string(),
  url: z.string(),
  startedAt: z.string().optional(),
  coverUrl: z.string().optional(),
  profileUrl: z.string().optional(),
});

const feedItemSchema = z.object({
  id: z.string().min(1),
  url: z.string(),
  text: z.string(),
  publishedAt: z.string().optional(),
  author: z.string().optional(),
  pinned: z.boolean().optional(),
  repostOf: z
    .object({
      author: z.string().optional(),
      text: z.string(),
      url: z.string().optional(),
    })
    .optional(),
});

const feedSnapshotSchema: z.ZodType<FeedSnapshot> = z.object({
  kind: z.literal('feed'),
  items: z.array(feedItemSchema),
  seen: z.array(z.string()),
});

/**
 * Runtime shape check for snapshots coming from adapters or from disk
 */
export const snapshotSchema: z.ZodType<Snapshot> = z.union([
  liveSnapshotSchema,
  feedSnapshotSchema,
]);
