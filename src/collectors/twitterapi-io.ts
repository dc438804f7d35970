import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { FeedResponseError } from '../shared/errors.js';
import { RawPost } from '../shared/types.js';
import { FeedPage, FeedPageRequest, FeedTransport } from './feed-client.js';

const TWITTERAPI_IO = 'https://api.twitterapi.io';

const count = z.number().int().nonnegative().catch(0);

const tweetSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  text: z.string().default(''),
  createdAt: z.string(),
  likeCount: count,
  retweetCount: count,
  replyCount: count,
  author: z.object({ userName: z.string().optional() }).optional()
});

const responseSchema = z.object({
  status: z.string().optional(),
  msg: z.string().nullish(),
  tweets: z.array(z.unknown()).optional(),
  data: z.object({ tweets: z.array(z.unknown()).optional() }).nullish(),
  has_next_page: z.boolean().optional(),
  next_cursor: z.string().nullish()
});

export function parseRetryAfter(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value * 1000;
  if (typeof value === 'string' && value.trim() !== '') {
    const seconds = Number(value);
    if (Number.isFinite(seconds)) return seconds * 1000;
    const date = Date.parse(value);
    if (!Number.isNaN(date)) return Math.max(0, date - Date.now());
  }
  return null;
}

function toRawPost(item: unknown, handle: string): RawPost | null {
  const parsed = tweetSchema.safeParse(item);
  if (!parsed.success) {
    logger.debug(`Dropping malformed tweet for @${handle}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    return null;
  }
  const tweet = parsed.data;
  const createdAt = Date.parse(tweet.createdAt);
  if (Number.isNaN(createdAt)) {
    logger.debug(`Dropping tweet ${tweet.id}: unparseable createdAt "${tweet.createdAt}"`);
    return null;
  }
  return {
    id: tweet.id,
    account: tweet.author?.userName ?? handle,
    text: tweet.text,
    createdAt,
    likeCount: tweet.likeCount,
    repostCount: tweet.retweetCount,
    replyCount: tweet.replyCount
  };
}

/**
 * twitterapi.io REST transport: `GET /twitter/user/last_tweets`, newest
 * first, cursor paginated.
 */
export class TwitterApiIoTransport implements FeedTransport {
  readonly name = 'twitterapi.io';
  private readonly http: AxiosInstance;

  constructor(options: { apiKey: string; timeoutMs?: number; http?: AxiosInstance }) {
    this.http =
      options.http ??
      axios.create({
        baseURL: TWITTERAPI_IO,
        timeout: options.timeoutMs ?? 30000,
        headers: { 'x-api-key': options.apiKey }
      });
  }

  async fetchPage(request: FeedPageRequest): Promise<FeedPage> {
    let body: unknown;
    try {
      const response = await this.http.get<unknown>('/twitter/user/last_tweets', {
        params: {
          userName: request.accountKey,
          includeReplies: false,
          ...(request.cursor ? { cursor: request.cursor } : {})
        }
      });
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        throw new FeedResponseError(
          error.response.status,
          `twitterapi.io responded ${error.response.status}`,
          parseRetryAfter(error.response.headers['retry-after']),
          { cause: error }
        );
      }
      throw error;
    }

    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      // FeedClient retries plain errors as transient.
      throw new Error(`Unexpected twitterapi.io response shape for @${request.handle}`);
    }
    const page = parsed.data;
    if (page.status === 'error') {
      throw new FeedResponseError(400, page.msg ?? 'twitterapi.io returned an error status');
    }

    const items = page.tweets ?? page.data?.tweets ?? [];
    const posts = items
      .map(item => toRawPost(item, request.handle))
      .filter((post): post is RawPost => post !== null);

    return {
      posts,
      nextCursor: page.has_next_page && page.next_cursor ? page.next_cursor : null
    };
  }
}
