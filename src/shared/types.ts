export type PriorityTier = 'high' | 'medium' | 'low';

export interface Account {
  handle: string;
  priorityTier: PriorityTier;
  defaultCategory?: string;
}

/** A post as the feed API returns it, before the cache has seen it. */
export interface RawPost {
  id: string;
  account: string;
  text: string;
  createdAt: number; // epoch ms
  likeCount: number;
  repostCount: number;
  replyCount: number;
}

export interface DerivedFields {
  category: string;
  sentimentScore: number;
  signals: string[];
}

export interface Post extends RawPost {
  fetchedAt: number;
  category: string | null;
  sentimentScore: number | null;
  signals: string[];
}

export type ScoredPost = Post & { category: string; sentimentScore: number };

export interface CacheEntry {
  post: Post;
  cacheVersion: string | null;
}

export interface PostFilter {
  category?: string;
  account?: string;
  since?: number;
  until?: number;
}

export interface PostReference {
  id: string;
  account: string;
  text: string;
  createdAt: number;
  engagement: number;
  sentimentScore: number;
}

export interface SentimentDistribution {
  positive: number;
  neutral: number;
  negative: number;
}

export interface CategoryStats {
  category: string;
  postCount: number;
  totalEngagement: number;
  meanSentiment: number;
  sentimentLabel: string;
  topPost: PostReference | null;
  signalCounts: Record<string, number>;
  distribution: SentimentDistribution;
}

export function isScored(post: Post): post is ScoredPost {
  return post.category !== null && post.sentimentScore !== null;
}

// Reposts count double, as they carry a post further than a like does.
export function engagementWeight(post: Pick<RawPost, 'likeCount' | 'repostCount' | 'replyCount'>): number {
  return post.likeCount + 2 * post.repostCount + post.replyCount;
}

export function normalizeHandle(handle: string): string {
  return handle.trim().replace(/^@/, '').toLowerCase();
}
