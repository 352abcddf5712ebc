/**
 * Extraction configuration
 *
 * Every option has a default. Bad values are rejected here, before any
 * file is read or any span is drawn.
 */

import { z } from 'zod';

export const DEFAULT_INDENT_UNIT = '    ';
export const DEFAULT_DEFINITION_KEYWORDS: readonly string[] = ['def', 'class'];

export const extractionConfigSchema = z
  .object({
    minMiddleLines: z.number().int().min(1).default(1),
    maxMiddleLines: z.number().int().min(1).default(10),
    targetExampleCount: z.number().int().min(0).default(50),
    perFileRetryBudget: z.number().int().min(0).default(10),
    globalRetryBudget: z.number().int().min(0).default(100),
    indentUnit: z
      .string()
      .min(1)
      .regex(/^[ \t]+$/, 'must contain only spaces or tabs')
      .default(DEFAULT_INDENT_UNIT),
    definitionKeywords: z
      .array(z.string().regex(/^\S+( \S+)*$/, 'must be a non-empty keyword'))
      .min(1)
      .default([...DEFAULT_DEFINITION_KEYWORDS]),
    dedupe: z.boolean().default(true),
    seed: z.number().int().optional(),
  })
  .strict()
  .refine(config => config.minMiddleLines <= config.maxMiddleLines, {
    message: 'minMiddleLines must not exceed maxMiddleLines',
    path: ['minMiddleLines'],
  });

export type ExtractionConfigInput = z.input<typeof extractionConfigSchema>;
export type ExtractionConfig = z.output<typeof extractionConfigSchema>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Fill in defaults and validate. Throws ConfigError listing every issue.
 */
export function resolveConfig(input: unknown = {}): ExtractionConfig {
  const parsed = extractionConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }
  return parsed.data;
}
