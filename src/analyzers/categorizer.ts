import { createHash } from 'node:crypto';
import { ConfigError } from '../shared/errors.js';
import { CategoriesConfig, CategoriesDefinition, categoriesFileSchema } from '../shared/config-files.js';
import { Account, normalizeHandle } from '../shared/types.js';
import { containsPhrase, tokenize } from './text.js';

interface CompiledRule {
  category: string;
  phrases: string[][];
}

export interface CategorizeInput {
  account: string;
  text: string;
}

/**
 * Assigns exactly one taxonomy category per post. Precedence: account
 * override, then the first keyword rule that matches, then the account's own
 * default, then the global default.
 */
export class Categorizer {
  readonly taxonomy: readonly string[];
  readonly defaultCategory: string;
  private readonly overrides: Map<string, string>;
  private readonly accountDefaults: Map<string, string>;
  private readonly rules: CompiledRule[];
  private readonly config: CategoriesConfig;

  constructor(config: CategoriesConfig, accounts: readonly Account[] = []) {
    const known = new Set(config.taxonomy);
    if (known.size !== config.taxonomy.length) {
      throw new ConfigError('Category taxonomy contains duplicates');
    }
    const requireKnown = (category: string, where: string) => {
      if (!known.has(category)) {
        throw new ConfigError(`Unknown category "${category}" in ${where}`);
      }
    };

    requireKnown(config.defaultCategory, 'defaultCategory');
    for (const [handle, category] of Object.entries(config.accountOverrides)) {
      requireKnown(category, `accountOverrides.${handle}`);
    }
    config.rules.forEach((rule, index) => requireKnown(rule.category, `rules[${index}]`));
    for (const account of accounts) {
      if (account.defaultCategory) requireKnown(account.defaultCategory, `account @${account.handle}`);
    }

    this.config = config;
    this.taxonomy = Object.freeze([...config.taxonomy]);
    this.defaultCategory = config.defaultCategory;
    this.overrides = new Map(
      Object.entries(config.accountOverrides).map(([handle, category]) => [normalizeHandle(handle), category])
    );
    this.accountDefaults = new Map(
      accounts.flatMap(account =>
        account.defaultCategory ? [[normalizeHandle(account.handle), account.defaultCategory] as const] : []
      )
    );
    this.rules = config.rules.map(rule => ({
      category: rule.category,
      phrases: rule.keywords.map(keyword => tokenize(keyword)).filter(tokens => tokens.length > 0)
    }));
  }

  static fromDefinition(definition: CategoriesDefinition, accounts: readonly Account[] = []): Categorizer {
    const parsed = categoriesFileSchema.safeParse(definition);
    if (!parsed.success) {
      throw new ConfigError(`Invalid category configuration: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
    }
    return new Categorizer(parsed.data, accounts);
  }

  isKnown(category: string): boolean {
    return this.taxonomy.includes(category);
  }

  categorize(post: CategorizeInput): string {
    const handle = normalizeHandle(post.account);
    const override = this.overrides.get(handle);
    if (override) return override;

    const tokens = tokenize(post.text);
    for (const rule of this.rules) {
      if (rule.phrases.some(phrase => containsPhrase(tokens, phrase))) {
        return rule.category;
      }
    }

    return this.accountDefaults.get(handle) ?? this.defaultCategory;
  }

  fingerprint(): string {
    const { taxonomy, defaultCategory, accountOverrides, rules } = this.config;
    const byHandle = ([a]: readonly [string, string], [b]: readonly [string, string]) => (a < b ? -1 : a > b ? 1 : 0);
    const overrides = Object.entries(accountOverrides).sort(byHandle);
    const hints = [...this.accountDefaults.entries()].sort(byHandle);
    return createHash('sha256')
      .update(JSON.stringify({ taxonomy, defaultCategory, overrides, hints, rules }))
      .digest('hex')
      .slice(0, 12);
  }
}
