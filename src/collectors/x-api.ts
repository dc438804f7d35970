import { ApiResponseError, TweetV2, TwitterApi } from 'twitter-api-v2';
import { logger } from '../shared/logger.js';
import { FeedResponseError } from '../shared/errors.js';
import { RawPost } from '../shared/types.js';
import { FeedPage, FeedPageRequest, FeedTransport } from './feed-client.js';

function toFeedError(error: unknown): unknown {
  if (error instanceof ApiResponseError) {
    const resetAt = error.rateLimit?.reset;
    const retryAfterMs = resetAt ? Math.max(0, resetAt * 1000 - Date.now()) : null;
    return new FeedResponseError(error.code, `X API responded ${error.code}`, retryAfterMs, {
      cause: error
    });
  }
  return error;
}

function toRawPost(tweet: TweetV2, handle: string): RawPost | null {
  const createdAt = tweet.created_at ? Date.parse(tweet.created_at) : Number.NaN;
  if (Number.isNaN(createdAt)) {
    logger.debug(`Dropping tweet ${tweet.id}: missing created_at`);
    return null;
  }
  return {
    id: tweet.id,
    account: handle,
    text: tweet.text,
    createdAt,
    likeCount: tweet.public_metrics?.like_count ?? 0,
    repostCount: tweet.public_metrics?.retweet_count ?? 0,
    replyCount: tweet.public_metrics?.reply_count ?? 0
  };
}

/**
 * Official X API v2 transport. Handles are resolved to user ids once and
 * remembered for the life of the transport.
 */
export class XApiTransport implements FeedTransport {
  readonly name = 'x-api-v2';
  private readonly client: TwitterApi;
  private readonly userIds = new Map<string, string>();

  constructor(options: { bearerToken: string } | { client: TwitterApi }) {
    this.client = 'client' in options ? options.client : new TwitterApi(options.bearerToken);
  }

  async resolveAccount(handle: string): Promise<string> {
    const known = this.userIds.get(handle);
    if (known) return known;

    try {
      const user = await this.client.v2.userByUsername(handle);
      if (!user.data) {
        throw new FeedResponseError(404, `X user @${handle} not found`);
      }
      this.userIds.set(handle, user.data.id);
      return user.data.id;
    } catch (error) {
      throw toFeedError(error);
    }
  }

  async fetchPage(request: FeedPageRequest): Promise<FeedPage> {
    try {
      const timeline = await this.client.v2.userTimeline(request.accountKey, {
        max_results: 100,
        start_time: new Date(request.since).toISOString(),
        exclude: ['retweets', 'replies'],
        'tweet.fields': ['created_at', 'public_metrics'],
        ...(request.cursor ? { pagination_token: request.cursor } : {})
      });

      const posts = timeline.tweets
        .map(tweet => toRawPost(tweet, request.handle))
        .filter((post): post is RawPost => post !== null);

      return { posts, nextCursor: timeline.meta.next_token ?? null };
    } catch (error) {
      throw toFeedError(error);
    }
  }
}
