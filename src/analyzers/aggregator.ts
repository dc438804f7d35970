import { SentimentThresholds } from '../shared/config-files.js';
import {
  CategoryStats,
  PostReference,
  ScoredPost,
  SentimentDistribution,
  engagementWeight
} from '../shared/types.js';

export const OVERALL = 'overall';

// Scores within this band of zero count as neutral in the distribution.
const NEUTRAL_BAND = 0.1;

export const DEFAULT_THRESHOLDS: SentimentThresholds = {
  veryPositive: 0.8,
  positive: 0.4,
  neutral: 0,
  negative: -0.4,
  veryNegative: -0.8
};

export interface AggregateResult {
  categories: CategoryStats[];
  overall: CategoryStats;
}

export function sentimentLabel(score: number, thresholds: SentimentThresholds = DEFAULT_THRESHOLDS): string {
  if (score >= thresholds.veryPositive) return 'Very Positive';
  if (score >= thresholds.positive) return 'Positive';
  if (score >= thresholds.neutral) return 'Slightly Positive';
  if (score >= thresholds.negative) return 'Slightly Negative';
  if (score >= thresholds.veryNegative) return 'Negative';
  return 'Very Negative';
}

export function sentimentDistribution(scores: readonly number[]): SentimentDistribution {
  let positive = 0;
  let negative = 0;
  for (const score of scores) {
    if (score > NEUTRAL_BAND) positive++;
    else if (score < -NEUTRAL_BAND) negative++;
  }
  return { positive, neutral: scores.length - positive - negative, negative };
}

export function toReference(post: ScoredPost): PostReference {
  return {
    id: post.id,
    account: post.account,
    text: post.text,
    createdAt: post.createdAt,
    engagement: engagementWeight(post),
    sentimentScore: post.sentimentScore
  };
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Highest engagement wins; ties go to the newer post, then the smaller id. */
export function isBetterTopPost(candidate: ScoredPost, current: ScoredPost): boolean {
  const diff = engagementWeight(candidate) - engagementWeight(current);
  if (diff !== 0) return diff > 0;
  if (candidate.createdAt !== current.createdAt) return candidate.createdAt > current.createdAt;
  return compareIds(candidate.id, current.id) < 0;
}

/**
 * Computes per-category and overall statistics over scored posts. Every
 * taxonomy category is reported, in taxonomy order, including empty ones.
 * The output does not depend on the order of the input.
 */
export class Aggregator {
  constructor(
    private readonly taxonomy: readonly string[],
    private readonly thresholds: SentimentThresholds = DEFAULT_THRESHOLDS
  ) {}

  aggregate(posts: Iterable<ScoredPost>): AggregateResult {
    const ordered = [...posts].sort((a, b) => compareIds(a.id, b.id));
    const partitions = new Map<string, ScoredPost[]>(this.taxonomy.map(category => [category, []]));

    for (const post of ordered) {
      const bucket = partitions.get(post.category);
      if (bucket) {
        bucket.push(post);
      } else {
        partitions.set(post.category, [post]);
      }
    }

    return {
      categories: [...partitions.entries()].map(([category, members]) => this.stats(category, members)),
      overall: this.stats(OVERALL, ordered)
    };
  }

  stats(category: string, posts: readonly ScoredPost[]): CategoryStats {
    let totalEngagement = 0;
    let weightedSum = 0;
    let weightTotal = 0;
    let top: ScoredPost | null = null;
    const signalCounts = new Map<string, number>();

    for (const post of posts) {
      const engagement = engagementWeight(post);
      const weight = Math.max(engagement, 1);
      totalEngagement += engagement;
      weightedSum += weight * post.sentimentScore;
      weightTotal += weight;

      if (top === null || isBetterTopPost(post, top)) top = post;

      for (const signal of post.signals) {
        signalCounts.set(signal, (signalCounts.get(signal) ?? 0) + 1);
      }
    }

    const meanSentiment = weightTotal > 0 ? weightedSum / weightTotal : 0;
    const sortedSignals = [...signalCounts.entries()].sort(([a], [b]) => compareIds(a, b));

    return {
      category,
      postCount: posts.length,
      totalEngagement,
      meanSentiment,
      sentimentLabel: posts.length > 0 ? sentimentLabel(meanSentiment, this.thresholds) : 'Neutral',
      topPost: top ? toReference(top) : null,
      signalCounts: Object.fromEntries(sortedSignals),
      distribution: sentimentDistribution(posts.map(post => post.sentimentScore))
    };
  }
}
