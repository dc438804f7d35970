import { Lexicon } from './lexicon.js';
import { containsPhrase, tokenize } from './text.js';

export interface SentimentResult {
  score: number;
  signals: string[];
}

export interface MatchedTerm {
  term: string;
  weight: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Lexicon-based financial sentiment. Each term found in the text adds its
 * weight once; the sum is scaled by the lexicon's saturation and clamped to
 * [-1, 1].
 */
export class SentimentScorer {
  constructor(private readonly lexicon: Lexicon) {}

  score(text: string): SentimentResult {
    const matches = this.match(text);
    if (matches.length === 0) {
      return { score: 0, signals: [] };
    }

    let total = 0;
    const signals = new Set<string>();
    for (const entry of matches) {
      total += entry.weight;
      if (entry.tags.length === 0) {
        signals.add(entry.term);
      } else {
        entry.tags.forEach(tag => signals.add(tag));
      }
    }

    const score = clamp(total / this.lexicon.saturation, -1, 1);
    return {
      // avoid -0 in serialized output
      score: score === 0 ? 0 : score,
      signals: [...signals].sort()
    };
  }

  /** Terms found in the text, in lexicon order. */
  explain(text: string): MatchedTerm[] {
    return this.match(text).map(entry => ({ term: entry.term, weight: entry.weight }));
  }

  private match(text: string) {
    const tokens = tokenize(text);
    if (tokens.length === 0) return [];
    return this.lexicon.entries.filter(entry => containsPhrase(tokens, entry.tokens));
  }
}
