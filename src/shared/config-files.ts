import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { Account } from './types.js';

export const accountSchema = z.object({
  handle: z.string().trim().min(1),
  priorityTier: z.enum(['high', 'medium', 'low']).default('medium'),
  defaultCategory: z.string().min(1).optional()
});

export const accountsFileSchema = z.object({
  accounts: z.array(accountSchema)
});

export const sentimentThresholdsSchema = z
  .object({
    veryPositive: z.number(),
    positive: z.number(),
    neutral: z.number(),
    negative: z.number(),
    veryNegative: z.number()
  })
  .refine(
    t => t.veryPositive > t.positive && t.positive > t.neutral && t.neutral > t.negative && t.negative > t.veryNegative,
    { message: 'thresholds must be strictly decreasing from veryPositive to veryNegative' }
  );

export const categoriesFileSchema = z.object({
  taxonomy: z.array(z.string().trim().min(1)).min(1),
  defaultCategory: z.string().min(1),
  accountOverrides: z.record(z.string()).default({}),
  rules: z
    .array(
      z.object({
        category: z.string().min(1),
        keywords: z.array(z.string().trim().min(1)).min(1)
      })
    )
    .default([]),
  sentimentThresholds: sentimentThresholdsSchema.default({
    veryPositive: 0.8,
    positive: 0.4,
    neutral: 0,
    negative: -0.4,
    veryNegative: -0.8
  })
});

export type CategoriesConfig = z.output<typeof categoriesFileSchema>;
export type CategoriesDefinition = z.input<typeof categoriesFileSchema>;
export type SentimentThresholds = z.output<typeof sentimentThresholdsSchema>;

export function readJsonFile<T extends z.ZodTypeAny>(filePath: string, schema: T): z.output<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(`Cannot read ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${filePath}: ${details}`);
  }
  return parsed.data;
}

export function loadAccounts(filePath: string): Account[] {
  return readJsonFile(filePath, accountsFileSchema).accounts;
}

export function loadCategories(filePath: string): CategoriesConfig {
  return readJsonFile(filePath, categoriesFileSchema);
}
