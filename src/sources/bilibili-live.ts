/**
 * bilibili live room status, looked up by user id
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { FetchError } from '../utils';
import { createHttpClient, parseResponse, toFetchError } from './http';
import type { BilibiliLiveSpec, LiveSnapshot, PlatformAdapter } from './types';

const LIVE_STATUS_API =
  'https://api.live.bilibili.com/room/v1/Room/get_status_info_by_uids';

const roomSchema = z.object({
  title: z.string(),
  room_id: z.number(),
  uid: z.number(),
  live_status: z.number(),
  live_time: z.number().optional(),
  uname: z.string(),
  cover_from_user: z.string().optional(),
});

const responseSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  msg: z.string().optional(),
  // An empty result comes back as [] instead of {}
  data: z.union([z.record(roomSchema), z.array(z.unknown())]).nullish(),
});

export class BilibiliLiveAdapter implements PlatformAdapter<'bilibili.live'> {
  readonly platform = 'bilibili.live' as const;
  readonly displayName = 'bilibili live';
  readonly snapshotKind = 'live' as const;

  private http: AxiosInstance;

  constructor(http: AxiosInstance = createHttpClient()) {
    this.http = http;
  }

  async fetch(spec: BilibiliLiveSpec): Promise<LiveSnapshot> {
    let body: unknown;
    try {
      const response = await this.http.post(LIVE_STATUS_API, {
        uids: [spec.userId],
      });
      body = response.data;
    } catch (error) {
      throw toFetchError(error, 'bilibili live status request');
    }

    const parsed = parseResponse(responseSchema, body, 'bilibili live status');
    if (parsed.code !== 0) {
      throw new FetchError(
        `bilibili live status returned code ${parsed.code}: ${parsed.message ?? parsed.msg ?? 'no message'}`
      );
    }

    const rooms = parsed.data && !Array.isArray(parsed.data) ? parsed.data : {};
    const room = rooms[String(spec.userId)];
    if (!room) {
      throw new FetchError(
        `bilibili live status has no room for user ${spec.userId}`
      );
    }

    const online = room.live_status === 1;
    return {
      kind: 'live',
      online,
      title: room.title,
      streamer: room.uname,
      url: `https://live.bilibili.com/${room.room_id}`,
      ...(online && room.live_time
        ? { startedAt: new Date(room.live_time * 1000).toISOString() }
        : {}),
      ...(room.cover_from_user ? { coverUrl: room.cover_from_user } : {}),
      profileUrl: `https://space.bilibili.com/${spec.userId}`,
    };
  }
}
