import { FeedPage, FeedPageRequest, FeedTransport } from '../src/collectors/feed-client.js';
import { Clock } from '../src/shared/resilience.js';
import { Post, RawPost } from '../src/shared/types.js';

export const HOUR = 60 * 60 * 1000;
export const NOW = Date.UTC(2024, 5, 1, 12, 0, 0);

/** Manual clock: sleeping advances time instantly and is recorded. */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private time: number = NOW) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }

  advance(ms: number) {
    this.time += ms;
  }
}

export function rawPost(overrides: Partial<RawPost> = {}): RawPost {
  return {
    id: '1',
    account: 'alice',
    text: 'Markets are moving today',
    createdAt: NOW - HOUR,
    likeCount: 0,
    repostCount: 0,
    replyCount: 0,
    ...overrides
  };
}

export function scoredPost(
  overrides: Partial<Post> & { category: string; sentimentScore: number }
): Post & { category: string; sentimentScore: number } {
  return {
    ...rawPost(overrides),
    fetchedAt: NOW,
    signals: [],
    ...overrides
  };
}

type Step = FeedPage | Error;

/**
 * Scripted transport: each handle gets a queue of pages or errors, consumed
 * one per request. Requests are recorded for assertions.
 */
export class ScriptedTransport implements FeedTransport {
  readonly name = 'scripted';
  readonly requests: FeedPageRequest[] = [];
  private readonly scripts = new Map<string, Step[]>();
  private readonly fallbacks = new Map<string, Step>();

  script(handle: string, ...steps: Step[]): this {
    this.scripts.set(handle, steps);
    return this;
  }

  /** Served whenever the handle's scripted steps are used up. */
  always(handle: string, step: Step): this {
    this.fallbacks.set(handle, step);
    return this;
  }

  async fetchPage(request: FeedPageRequest): Promise<FeedPage> {
    this.requests.push(request);
    const step = this.scripts.get(request.handle)?.shift() ?? this.fallbacks.get(request.handle);
    if (step === undefined) {
      return { posts: [], nextCursor: null };
    }
    if (step instanceof Error) throw step;
    return step;
  }

  requestsFor(handle: string): FeedPageRequest[] {
    return this.requests.filter(request => request.handle === handle);
  }
}
