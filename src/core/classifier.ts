/**
 * Line Classifier
 *
 * Shallow lexical checks over a single line of source. No parsing: a line
 * is a definition header when it starts with a definition keyword, and it
 * is "inside a block" when it starts with one indentation unit.
 */

import { DEFAULT_DEFINITION_KEYWORDS, DEFAULT_INDENT_UNIT } from './config.js';
import type { ClassifierOptions, LineClassifier } from './types.js';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function headerPattern(keywords: readonly string[]): RegExp {
  // 'async def' matches with any run of whitespace between the words
  const alternatives = keywords.map(keyword =>
    keyword.trim().split(/\s+/).map(escapeRegExp).join('\\s+')
  );
  return new RegExp(`^\\s*(?:${alternatives.join('|')})\\s`);
}

export function createLineClassifier(options: ClassifierOptions = {}): LineClassifier {
  const indentUnit = options.indentUnit ?? DEFAULT_INDENT_UNIT;
  const header = headerPattern(options.definitionKeywords ?? DEFAULT_DEFINITION_KEYWORDS);

  return {
    isDefinitionHeader: line => header.test(line),
    isDecorator: line => line.trim().startsWith('@'),
    isIndented: line => line.startsWith(indentUnit),
    indentDepth,
  };
}

/**
 * Leading whitespace characters before the first non-whitespace one.
 * Blank lines have depth 0.
 */
export function indentDepth(line: string): number {
  const trimmed = line.trimStart();
  return trimmed.length === 0 ? 0 : line.length - trimmed.length;
}

export const defaultClassifier: LineClassifier = createLineClassifier();

export function isDefinitionHeader(line: string): boolean {
  return defaultClassifier.isDefinitionHeader(line);
}

export function isDecorator(line: string): boolean {
  return defaultClassifier.isDecorator(line);
}

export function isIndented(line: string): boolean {
  return defaultClassifier.isIndented(line);
}
