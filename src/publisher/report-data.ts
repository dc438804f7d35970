import { AggregateResult, toReference } from '../analyzers/aggregator.js';
import { CollectionResult } from '../collectors/collector.js';
import { CategoryStats, PostReference, ScoredPost } from '../shared/types.js';

export interface ReportWindow {
  since: string;
  until: string;
}

/** The record handed to dashboards and report writers. Plain JSON only. */
export interface ReportData {
  generatedAt: string;
  window: ReportWindow;
  cacheVersion: string;
  totalPosts: number;
  categories: CategoryStats[];
  overall: CategoryStats;
  newPosts: PostReference[];
  insights: string[];
  narrative: string | null;
  collection: CollectionResult | null;
}

export interface ReportInput {
  generatedAt: number;
  since: number;
  until: number;
  cacheVersion: string;
  aggregate: AggregateResult;
  newPosts?: readonly ScoredPost[];
  collection?: CollectionResult | null;
  narrative?: string | null;
}

const RISK_LOW = -0.5;
const RISK_HIGH = 0.7;

export function formatCategory(category: string): string {
  return category
    .split('_')
    .filter(word => word.length > 0)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function buildInsights(aggregate: AggregateResult): string[] {
  const { overall } = aggregate;
  const insights = [
    `Overall market sentiment: ${overall.sentimentLabel} (score: ${overall.meanSentiment.toFixed(2)})`
  ];

  for (const stats of aggregate.categories) {
    if (stats.postCount === 0) continue;
    insights.push(
      `${formatCategory(stats.category)}: ${stats.sentimentLabel} (${stats.postCount} posts, score: ${stats.meanSentiment.toFixed(2)})`
    );
  }

  if (overall.postCount > 0 && overall.meanSentiment < RISK_LOW) {
    insights.push('⚠️ High negative sentiment detected - increased market risk');
  } else if (overall.postCount > 0 && overall.meanSentiment > RISK_HIGH) {
    insights.push('🚀 Strong positive sentiment - potential overheating risk');
  }

  return insights;
}

export class ReportDataBuilder {
  build(input: ReportInput): ReportData {
    const newPosts = [...(input.newPosts ?? [])]
      .sort((a, b) => b.createdAt - a.createdAt || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map(toReference);

    return {
      generatedAt: new Date(input.generatedAt).toISOString(),
      window: {
        since: new Date(input.since).toISOString(),
        until: new Date(input.until).toISOString()
      },
      cacheVersion: input.cacheVersion,
      totalPosts: input.aggregate.overall.postCount,
      categories: input.aggregate.categories,
      overall: input.aggregate.overall,
      newPosts,
      insights: buildInsights(input.aggregate),
      narrative: input.narrative ?? null,
      collection: input.collection ?? null
    };
  }

  withNarrative(report: ReportData, narrative: string | null): ReportData {
    return { ...report, narrative };
  }
}
