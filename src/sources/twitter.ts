/**
 * Twitter (X) user timeline, read through the web GraphQL API with the
 * session of a shared account
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { FetchError } from '../utils';
import { sortOldestFirst } from './feed';
import { createHttpClient, parseResponse, toFetchError } from './http';
import type {
  FeedItem,
  FeedSnapshot,
  PlatformAccount,
  PlatformAdapter,
  TwitterSpec,
} from './types';

const GRAPHQL_BASE = 'https://x.com/i/api/graphql';
const USER_BY_SCREEN_NAME = `${GRAPHQL_BASE}/xmU6X_CKVnQ5lSrCbAmJsg/UserByScreenName`;
const USER_TWEETS = `${GRAPHQL_BASE}/V7H0Ap3_Hh2FyS75OCDO3Q/UserTweets`;

const USER_FEATURES = {
  hidden_profile_subscriptions_enabled: true,
  responsive_web_graphql_exclude_directive_enabled: true,
  verified_phone_label_enabled: false,
  highlights_tweets_tab_ui_enabled: true,
  creator_subscriptions_tweet_preview_api_enabled: true,
  responsive_web_graphql_skip_user_profile_image_extensions_enabled: false,
  responsive_web_graphql_timeline_navigation_enabled: true,
};

const TWEETS_FEATURES = {
  responsive_web_graphql_exclude_directive_enabled: true,
  verified_phone_label_enabled: false,
  creator_subscriptions_tweet_preview_api_enabled: true,
  responsive_web_graphql_timeline_navigation_enabled: true,
  responsive_web_graphql_skip_user_profile_image_extensions_enabled: false,
  view_counts_everywhere_api_enabled: true,
  longform_notetweets_consumption_enabled: true,
  responsive_web_edit_tweet_api_enabled: true,
  freedom_of_speech_not_reach_fetch_enabled: true,
  standardized_nudges_misinfo: true,
  longform_notetweets_rich_text_read_enabled: true,
  longform_notetweets_inline_media_enabled: true,
  responsive_web_enhance_cards_enabled: false,
};

const userSchema = z.object({
  data: z.object({
    user: z.object({
      result: z.object({
        rest_id: z.string(),
        legacy: z.object({ name: z.string(), screen_name: z.string() }),
      }),
    }),
  }),
});

const tweetSchema = z.object({
  rest_id: z.string(),
  core: z
    .object({
      user_results: z.object({
        result: z.object({
          legacy: z.object({ name: z.string(), screen_name: z.string() }),
        }),
      }),
    })
    .optional(),
  legacy: z.object({
    full_text: z.string(),
    created_at: z.string(),
    retweeted_status_result: z.object({ result: z.unknown() }).optional(),
  }),
});

type Tweet = z.infer<typeof tweetSchema>;

const tweetResultSchema = z.union([
  tweetSchema.extend({ __typename: z.literal('Tweet') }),
  z.object({
    __typename: z.literal('TweetWithVisibilityResults'),
    tweet: tweetSchema,
  }),
]);

const timelineItemSchema = z.object({
  itemContent: z
    .object({
      tweet_results: z.object({ result: z.unknown() }).optional(),
    })
    .optional(),
});

const entrySchema = z.object({
  entryId: z.string().optional(),
  content: z.object({
    entryType: z.string().optional(),
    itemContent: timelineItemSchema.shape.itemContent,
    items: z.array(z.object({ item: timelineItemSchema })).optional(),
  }),
});

const instructionSchema = z.object({
  type: z.string(),
  entry: entrySchema.optional(),
  entries: z.array(entrySchema).optional(),
});

const timelineSchema = z.object({
  timeline: z.object({ instructions: z.array(instructionSchema) }),
});

const tweetsSchema = z.object({
  data: z.object({
    user: z.object({
      result: z.object({
        timeline_v2: timelineSchema.optional(),
        timeline: timelineSchema.optional(),
      }),
    }),
  }),
});

type Entry = z.infer<typeof entrySchema>;

/**
 * Extract the `ct0` cookie, sent back as the CSRF token
 */
export function csrfTokenFromCookies(cookies: string): string {
  for (const cookie of cookies.split(';')) {
    const trimmed = cookie.trim();
    if (trimmed.startsWith('ct0=')) {
      return trimmed.slice('ct0='.length);
    }
  }
  throw new FetchError("cookie 'ct0' not found in twitter account cookies");
}

function unwrapTweet(result: unknown): Tweet | undefined {
  const parsed = tweetResultSchema.safeParse(result);
  if (!parsed.success) {
    // tombstones, unavailable tweets, ads
    return undefined;
  }
  return parsed.data.__typename === 'Tweet' ? parsed.data : parsed.data.tweet;
}

function toFeedItem(tweet: Tweet, username: string, pinned: boolean): FeedItem {
  const author = tweet.core?.user_results.result.legacy;
  const screenName = author?.screen_name ?? username;
  const item: FeedItem = {
    id: tweet.rest_id,
    url: `https://x.com/${screenName}/status/${tweet.rest_id}`,
    text: tweet.legacy.full_text,
    author: author?.name ?? username,
  };

  const created = Date.parse(tweet.legacy.created_at);
  if (!Number.isNaN(created)) {
    item.publishedAt = new Date(created).toISOString();
  }
  if (pinned) {
    item.pinned = true;
  }

  const retweeted = unwrapTweet(tweet.legacy.retweeted_status_result?.result);
  if (retweeted) {
    const origin = retweeted.core?.user_results.result.legacy;
    item.text = '';
    item.repostOf = {
      text: retweeted.legacy.full_text,
      ...(origin && {
        author: origin.name,
        url: `https://x.com/${origin.screen_name}/status/${retweeted.rest_id}`,
      }),
    };
  }
  return item;
}

function tweetsOfEntry(entry: Entry): unknown[] {
  const results: unknown[] = [];
  const direct = entry.content.itemContent?.tweet_results?.result;
  if (direct !== undefined) {
    results.push(direct);
  }
  for (const moduleItem of entry.content.items ?? []) {
    const nested = moduleItem.item.itemContent?.tweet_results?.result;
    if (nested !== undefined) {
      results.push(nested);
    }
  }
  return results;
}

export class TwitterAdapter implements PlatformAdapter<'twitter'> {
  readonly platform = 'twitter' as const;
  readonly displayName = 'Twitter';
  readonly snapshotKind = 'feed' as const;

  private http: AxiosInstance;
  private userIds = new Map<string, string>();

  constructor(http: AxiosInstance = createHttpClient()) {
    this.http = http;
  }

  async fetch(
    spec: TwitterSpec,
    account?: PlatformAccount
  ): Promise<FeedSnapshot> {
    const { cookies, bearerToken } = account?.credentials ?? {};
    if (!cookies || !bearerToken) {
      throw new FetchError(
        `twitter account '${spec.account}' is missing cookies or bearer token`
      );
    }
    const headers = {
      Authorization: `Bearer ${bearerToken}`,
      Cookie: cookies,
      'x-csrf-token': csrfTokenFromCookies(cookies),
    };

    const userId = await this.resolveUserId(spec.username, headers);
    const body = await this.request(
      USER_TWEETS,
      {
        userId,
        count: 20,
        includePromotedContent: false,
        withVoice: true,
        withV2Timeline: true,
      },
      TWEETS_FEATURES,
      headers,
      'twitter user tweets'
    );

    const result = parseResponse(tweetsSchema, body, 'twitter user tweets').data
      .user.result;
    const timeline = result.timeline_v2 ?? result.timeline;
    if (!timeline) {
      throw new FetchError(`twitter timeline of '${spec.username}' is missing`);
    }

    const items: FeedItem[] = [];
    const seen = new Set<string>();
    for (const instruction of timeline.timeline.instructions) {
      const pinned = instruction.type === 'TimelinePinEntry';
      const entries = instruction.entries ?? (instruction.entry ? [instruction.entry] : []);
      for (const entry of entries) {
        for (const raw of tweetsOfEntry(entry)) {
          const tweet = unwrapTweet(raw);
          if (!tweet || seen.has(tweet.rest_id)) {
            continue;
          }
          seen.add(tweet.rest_id);
          items.push(toFeedItem(tweet, spec.username, pinned));
        }
      }
    }

    return { kind: 'feed', items: sortOldestFirst(items), seen: [] };
  }

  private async resolveUserId(
    username: string,
    headers: Record<string, string>
  ): Promise<string> {
    const cached = this.userIds.get(username);
    if (cached) {
      return cached;
    }
    const body = await this.request(
      USER_BY_SCREEN_NAME,
      { screen_name: username, withSafetyModeUserFields: true },
      USER_FEATURES,
      headers,
      'twitter user lookup'
    );
    const userId = parseResponse(userSchema, body, 'twitter user lookup').data
      .user.result.rest_id;
    this.userIds.set(username, userId);
    return userId;
  }

  private async request(
    url: string,
    variables: Record<string, unknown>,
    features: Record<string, boolean>,
    headers: Record<string, string>,
    what: string
  ): Promise<unknown> {
    try {
      const response = await this.http.get(url, {
        params: {
          variables: JSON.stringify(variables),
          features: JSON.stringify(features),
        },
        headers,
      });
      return response.data;
    } catch (error) {
      throw toFetchError(error, what);
    }
  }
}
