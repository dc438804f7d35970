import { describe, it, expect } from 'vitest';
import { FeedClient, FeedClientOptions } from '../src/collectors/feed-client.js';
import {
  FeedResponseError,
  PermanentFetchError,
  RateLimitExceeded,
  TransientFetchError
} from '../src/shared/errors.js';
import { RateLimiter } from '../src/shared/rate-limiter.js';
import { FakeClock, HOUR, NOW, ScriptedTransport, rawPost } from './helpers.js';

const SINCE = NOW - 24 * HOUR;

function setup(options: Partial<FeedClientOptions> = {}) {
  const clock = new FakeClock();
  const transport = new ScriptedTransport();
  const limiter = new RateLimiter({ minIntervalMs: 1000, clock });
  const client = new FeedClient(transport, limiter, {
    clock,
    random: () => 0,
    retry: { initialDelayMs: 100, maxDelayMs: 1000, backoffMultiplier: 2, jitterPercent: 10 },
    maxPages: 3,
    ...options
  });
  return { clock, transport, client };
}

describe('FeedClient.fetchRecent()', () => {
  describe('rate limiting', () => {
    it('retries a 429 after at least one interval, honouring a longer retry-after', async () => {
      const { clock, transport, client } = setup();
      transport.script(
        'alice',
        new FeedResponseError(429, 'too many requests'),
        new FeedResponseError(429, 'too many requests', 3000),
        { posts: [rawPost({ id: 'a1' })], nextCursor: null }
      );

      const posts = await client.fetchRecent('alice', SINCE);

      expect(posts.map(post => post.id)).toEqual(['a1']);
      expect(clock.sleeps).toEqual([1000, 3000]);
      expect(transport.requests).toHaveLength(3);
    });

    it('gives up with RateLimitExceeded after three 429s', async () => {
      const { transport, client } = setup();
      const limited = new FeedResponseError(429, 'too many requests');
      transport.always('alice', limited);

      await expect(client.fetchRecent('alice', SINCE)).rejects.toBeInstanceOf(RateLimitExceeded);
      expect(transport.requests).toHaveLength(3);
    });
  });

  describe('transient failures', () => {
    it('backs off exponentially and recovers', async () => {
      const { clock, transport, client } = setup();
      transport.script(
        'alice',
        new FeedResponseError(503, 'unavailable'),
        new Error('socket hang up'),
        { posts: [rawPost({ id: 'a1' })], nextCursor: null }
      );

      const posts = await client.fetchRecent('alice', SINCE);

      expect(posts).toHaveLength(1);
      // backoff 100ms then pacing 900ms; backoff 200ms then pacing 800ms
      expect(clock.sleeps).toEqual([100, 900, 200, 800]);
    });

    it('surfaces TransientFetchError once attempts are exhausted', async () => {
      const { transport, client } = setup();
      transport.always('alice', new FeedResponseError(500, 'server error'));

      const error = await client.fetchRecent('alice', SINCE).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientFetchError);
      expect(error).toMatchObject({ account: 'alice', kind: 'transient' });
      expect(error instanceof TransientFetchError && error.retryable).toBe(true);
      expect(transport.requests).toHaveLength(3);
    });
  });

  it('does not retry other 4xx responses', async () => {
    const { transport, client } = setup();
    transport.script('ghost', new FeedResponseError(404, 'user not found'));

    const error = await client.fetchRecent('ghost', SINCE).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PermanentFetchError);
    expect(error).toMatchObject({ account: 'ghost', status: 404 });
    expect(error instanceof PermanentFetchError && error.retryable).toBe(false);
    expect(transport.requests).toHaveLength(1);
  });

  describe('pagination', () => {
    it('stops once a page reaches past the window start and drops older posts', async () => {
      const { transport, client } = setup();
      transport.script(
        'alice',
        { posts: [rawPost({ id: 'a1' }), rawPost({ id: 'a2', createdAt: NOW - 2 * HOUR })], nextCursor: 'c2' },
        { posts: [rawPost({ id: 'a3', createdAt: NOW - 3 * HOUR }), rawPost({ id: 'old', createdAt: NOW - 30 * HOUR })], nextCursor: 'c3' },
        { posts: [rawPost({ id: 'never' })], nextCursor: null }
      );

      const posts = await client.fetchRecent('alice', SINCE);

      expect(posts.map(post => post.id).sort()).toEqual(['a1', 'a2', 'a3']);
      expect(transport.requests.map(request => request.cursor)).toEqual([null, 'c2']);
    });

    it('reads at most maxPages pages', async () => {
      const { transport, client } = setup({ maxPages: 2 });
      transport.always('alice', { posts: [rawPost({ id: 'a1' })], nextCursor: 'more' });

      await client.fetchRecent('alice', SINCE);

      expect(transport.requests).toHaveLength(2);
    });

    it('fails the whole account when a later page fails', async () => {
      const { transport, client } = setup();
      transport.script(
        'alice',
        { posts: [rawPost({ id: 'a1' })], nextCursor: 'c2' },
        new FeedResponseError(404, 'not found')
      );

      await expect(client.fetchRecent('alice', SINCE)).rejects.toBeInstanceOf(PermanentFetchError);
      expect(transport.requests.map(request => request.cursor)).toEqual([null, 'c2']);
    });

    it('collapses duplicate ids and normalizes handles', async () => {
      const { transport, client } = setup();
      transport.script(
        'alice',
        { posts: [rawPost({ id: 'a1', account: 'Alice' })], nextCursor: 'c2' },
        { posts: [rawPost({ id: 'a1', account: 'Alice' })], nextCursor: null }
      );

      const posts = await client.fetchRecent('@Alice', SINCE);

      expect(posts).toHaveLength(1);
      expect(posts[0]?.account).toBe('alice');
      expect(transport.requests[0]?.handle).toBe('alice');
    });
  });

  it('resolves the account key once before paging', async () => {
    const { clock, transport, client } = setup();
    const resolved: string[] = [];
    Object.assign(transport, {
      resolveAccount: async (handle: string) => {
        resolved.push(handle);
        return '42';
      }
    });
    transport.script('alice', { posts: [], nextCursor: null });

    await client.fetchRecent('alice', SINCE);

    expect(resolved).toEqual(['alice']);
    expect(transport.requests[0]?.accountKey).toBe('42');
    // the lookup is a paced request of its own
    expect(clock.sleeps).toEqual([1000]);
  });
});
