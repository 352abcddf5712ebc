import type { Example } from './types.js';

export interface FimTokens {
  prefix: string;
  suffix: string;
  middle: string;
}

/** StarCoder-style sentinel tokens. */
export const STARCODER_FIM_TOKENS: FimTokens = {
  prefix: '<fim_prefix>',
  suffix: '<fim_suffix>',
  middle: '<fim_middle>',
};

/**
 * Render an example as a prefix-suffix-middle prompt. The model is expected
 * to continue after the middle token with the example's middle.
 */
export function formatFimPrompt(
  example: Pick<Example, 'prefix' | 'suffix'>,
  tokens: FimTokens = STARCODER_FIM_TOKENS
): string {
  return `${tokens.prefix}${example.prefix}${tokens.suffix}${example.suffix}${tokens.middle}`;
}
