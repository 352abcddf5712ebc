/**
 * Span Sampler
 *
 * Draws a middle span from a file's executed lines. Start positions follow
 * a normal distribution centred on the middle of the executed-line list, so
 * interior logic is picked more often than imports or top-level scaffolding.
 * Endpoints are indices into the executed lines; everything between them in
 * the file, executed or not, becomes the middle.
 */

import { defaultClassifier } from './classifier.js';
import { randomInt, randomNormal } from './random.js';
import { forbiddenIndentDepths, isAdmissibleMiddle } from './validator.js';
import type { MiddleSpan, SampleOptions, SpanResult } from './types.js';

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function lineRange(startLine: number, endLine: number): number[] {
  const lines: number[] = [];
  for (let line = startLine; line <= endLine; line++) lines.push(line);
  return lines;
}

/**
 * Map executed-line indices to the file lines of a candidate middle.
 * The range is half-open on the end index; when both indices land on the
 * same line the middle is that single line.
 */
export function candidateSpan(
  executedLines: readonly number[],
  startIndex: number,
  endIndex: number
): MiddleSpan | null {
  const startLine = executedLines[startIndex];
  const endBound = executedLines[endIndex];
  if (startLine === undefined || endBound === undefined) return null;

  const endLine = Math.max(endBound - 1, startLine);
  return {
    startLine,
    endLine,
    lineNumbers: lineRange(startLine, endLine),
    startIndex,
    endIndex,
  };
}

export function sampleMiddleSpan(
  executedLines: readonly number[],
  fileLines: readonly string[],
  options: SampleOptions = {}
): SpanResult {
  const minMiddle = options.minMiddle ?? 1;
  const maxMiddle = options.maxMiddle ?? 10;
  const retries = options.retries ?? 10;
  const rng = options.rng ?? Math.random;
  const classifier = options.classifier ?? defaultClassifier;

  const n = executedLines.length;
  if (n === 0) return { kind: 'none', reason: 'empty', attempts: 0 };
  if (n < minMiddle) return { kind: 'none', reason: 'too-few-lines', attempts: 0 };

  const meanIndex = Math.floor(n / 2);
  const stdDev = Math.floor(n / 4);
  const maxStart = n - minMiddle;

  for (let attempt = 1; attempt <= retries; attempt++) {
    const startIndex = Math.trunc(clamp(randomNormal(rng, meanIndex, stdDev), 0, maxStart));
    const endIndex = Math.min(startIndex + randomInt(rng, minMiddle, maxMiddle), n - 1);

    const span = candidateSpan(executedLines, startIndex, endIndex);
    if (!span) continue;

    const forbidden = forbiddenIndentDepths(fileLines, span.startLine, classifier);
    if (isAdmissibleMiddle(fileLines, span.lineNumbers, forbidden, classifier)) {
      return { kind: 'span', span, attempts: attempt };
    }
  }

  return { kind: 'none', reason: 'exhausted', attempts: retries };
}
