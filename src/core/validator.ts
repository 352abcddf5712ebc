/**
 * Structural Validator
 *
 * Decides whether a candidate middle can be cut out of a file without
 * taking scaffolding the model cannot infer, and whether the prefix left
 * behind holds at least one definition with a body.
 */

import { defaultClassifier } from './classifier.js';
import type { LineClassifier } from './types.js';

/**
 * True when some definition header is directly followed by an indented line.
 */
export function hasDefinitionWithBody(
  lines: readonly string[],
  classifier: LineClassifier = defaultClassifier
): boolean {
  for (let i = 0; i + 1 < lines.length; i++) {
    const line = lines[i];
    const next = lines[i + 1];
    if (line === undefined || next === undefined) continue;
    if (classifier.isDefinitionHeader(line) && classifier.isIndented(next)) {
      return true;
    }
  }
  return false;
}

/**
 * Indentation depths of every definition header above `startLine`
 * (1-indexed; lines 1 .. startLine - 1).
 */
export function forbiddenIndentDepths(
  fileLines: readonly string[],
  startLine: number,
  classifier: LineClassifier = defaultClassifier
): Set<number> {
  const depths = new Set<number>();
  const end = Math.min(Math.max(startLine - 1, 0), fileLines.length);

  for (let i = 0; i < end; i++) {
    const line = fileLines[i];
    if (line !== undefined && classifier.isDefinitionHeader(line)) {
      depths.add(classifier.indentDepth(line));
    }
  }

  return depths;
}

/**
 * A middle is admissible when none of its lines is a definition header or
 * a decorator, and none sits at the depth of a prefix definition. Line
 * numbers are 1-indexed; numbers outside the file make the span invalid.
 */
export function isAdmissibleMiddle(
  fileLines: readonly string[],
  lineNumbers: readonly number[],
  forbiddenDepths: ReadonlySet<number>,
  classifier: LineClassifier = defaultClassifier
): boolean {
  const firstNumber = lineNumbers[0];
  if (firstNumber === undefined) return false;

  const first = fileLines[firstNumber - 1];
  if (first === undefined) return false;
  // Also rejects an ordinary first statement at a definition's depth
  if (forbiddenDepths.has(classifier.indentDepth(first))) return false;

  for (const lineNumber of lineNumbers) {
    const line = fileLines[lineNumber - 1];
    if (line === undefined) return false;

    if (
      classifier.isDefinitionHeader(line) ||
      classifier.isDecorator(line) ||
      forbiddenDepths.has(classifier.indentDepth(line))
    ) {
      return false;
    }
  }

  return true;
}
