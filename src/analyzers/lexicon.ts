import { createHash } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { LexiconLoadError, errorMessage } from '../shared/errors.js';
import { tokenize } from './text.js';

export interface LexiconEntry {
  readonly term: string;
  readonly weight: number;
  readonly tags: readonly string[];
}

export interface CompiledEntry extends LexiconEntry {
  readonly tokens: readonly string[];
}

export const lexiconFileSchema = z.object({
  saturation: z.number().positive().finite().default(4),
  entries: z
    .array(
      z.object({
        term: z.string().trim().min(1),
        weight: z.number().finite(),
        tags: z.array(z.string().min(1)).default([])
      })
    )
    .min(1)
});

export type LexiconFile = z.input<typeof lexiconFileSchema>;

/**
 * Immutable table of weighted sentiment terms. Terms are matched on token
 * boundaries and compared case-insensitively.
 */
export class Lexicon {
  readonly saturation: number;
  private readonly compiled: readonly CompiledEntry[];

  private constructor(saturation: number, entries: CompiledEntry[]) {
    this.saturation = saturation;
    this.compiled = Object.freeze(entries);
  }

  static fromDefinition(definition: unknown, source = 'inline lexicon'): Lexicon {
    const parsed = lexiconFileSchema.safeParse(definition);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new LexiconLoadError(
        `Invalid ${source}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'schema mismatch'}`
      );
    }

    const seen = new Set<string>();
    const entries: CompiledEntry[] = [];
    for (const entry of parsed.data.entries) {
      const tokens = tokenize(entry.term);
      if (tokens.length === 0) {
        throw new LexiconLoadError(`Invalid ${source}: term "${entry.term}" has no letters or digits`);
      }
      const key = tokens.join(' ');
      if (seen.has(key)) {
        throw new LexiconLoadError(`Invalid ${source}: duplicate term "${entry.term}"`);
      }
      seen.add(key);
      entries.push(
        Object.freeze({
          term: key,
          weight: entry.weight,
          tags: Object.freeze([...entry.tags]),
          tokens: Object.freeze(tokens)
        })
      );
    }

    return new Lexicon(parsed.data.saturation, entries);
  }

  get entries(): readonly CompiledEntry[] {
    return this.compiled;
  }

  get size(): number {
    return this.compiled.length;
  }

  /** Stable digest of the table; changes whenever any term, weight or tag does. */
  fingerprint(): string {
    const canonical = [...this.compiled]
      .sort((a, b) => (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
      .map(entry => [entry.term, entry.weight, [...entry.tags].sort()]);
    return createHash('sha256')
      .update(JSON.stringify({ saturation: this.saturation, entries: canonical }))
      .digest('hex')
      .slice(0, 12);
  }
}

export function loadLexicon(filePath: string): Lexicon {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new LexiconLoadError(`Cannot read lexicon ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  const lexicon = Lexicon.fromDefinition(raw, `lexicon ${filePath}`);
  logger.info(`Loaded lexicon with ${lexicon.size} terms (${lexicon.fingerprint()})`);
  return lexicon;
}
