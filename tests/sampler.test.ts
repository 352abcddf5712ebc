/**
 * Span Sampler Tests
 */

import { describe, it, expect } from 'vitest';
import { candidateSpan, sampleMiddleSpan } from '../src/core/sampler.js';
import { indentDepth } from '../src/core/classifier.js';
import { mulberry32 } from '../src/core/random.js';

// Every uniform draw is 0: normal draws land on the mean, lengths on the minimum
const zeroRng = () => 0;

function bodyFile(): string[] {
  const lines = ['def f():\n', '    a = 1\n'];
  for (let line = 3; line <= 20; line++) lines.push(`    v${line} = ${line}\n`);
  return lines;
}

const EXECUTED = [5, 6, 7, 8, 9, 10, 11, 12, 13, 14];

describe('candidateSpan', () => {
  it('should take file lines up to the end index, exclusive', () => {
    const span = candidateSpan([3, 5, 9], 0, 2);
    expect(span).toEqual({
      startLine: 3,
      endLine: 8,
      lineNumbers: [3, 4, 5, 6, 7, 8],
      startIndex: 0,
      endIndex: 2,
    });
  });

  it('should widen a collapsed range to one line', () => {
    expect(candidateSpan([3, 5, 9], 1, 1)?.lineNumbers).toEqual([5]);
  });

  it('should return null for indices outside the list', () => {
    expect(candidateSpan([3, 5, 9], 0, 3)).toBeNull();
  });
});

describe('sampleMiddleSpan', () => {
  it('should pick the centre of the executed lines', () => {
    const result = sampleMiddleSpan(EXECUTED, bodyFile(), {
      minMiddle: 2,
      maxMiddle: 4,
      rng: zeroRng,
    });

    expect(result).toEqual({
      kind: 'span',
      attempts: 1,
      span: {
        startLine: 10,
        endLine: 11,
        lineNumbers: [10, 11],
        startIndex: 5,
        endIndex: 7,
      },
    });
  });

  it('should never select lines at the depth of a prefix definition', () => {
    const file = bodyFile();
    file[7] = 'flag = True\n'; // line 8, depth 0
    let found = 0;

    for (let seed = 1; seed <= 200; seed++) {
      const result = sampleMiddleSpan(EXECUTED, file, {
        minMiddle: 2,
        maxMiddle: 4,
        rng: mulberry32(seed),
      });
      if (result.kind === 'none') continue;
      found++;

      expect(result.span.startLine).toBeGreaterThanOrEqual(5);
      expect(result.span.endLine).toBeLessThanOrEqual(13);
      for (const lineNumber of result.span.lineNumbers) {
        expect(indentDepth(file[lineNumber - 1] ?? '')).not.toBe(0);
      }
    }

    expect(found).toBeGreaterThan(0);
  });

  it('should report an empty executed-lines list without drawing', () => {
    let draws = 0;
    const result = sampleMiddleSpan([], bodyFile(), {
      rng: () => {
        draws++;
        return 0.5;
      },
    });

    expect(result).toEqual({ kind: 'none', reason: 'empty', attempts: 0 });
    expect(draws).toBe(0);
  });

  it('should report too few executed lines for the minimum', () => {
    const result = sampleMiddleSpan([3], bodyFile(), { minMiddle: 2, rng: zeroRng });
    expect(result).toEqual({ kind: 'none', reason: 'too-few-lines', attempts: 0 });
  });

  it('should return a one-line span for a single admissible executed line', () => {
    const result = sampleMiddleSpan([3], bodyFile(), { rng: mulberry32(1) });

    expect(result.kind).toBe('span');
    if (result.kind === 'span') {
      expect(result.span.lineNumbers).toEqual([3]);
    }
  });

  it('should give up after the retry budget for a single inadmissible line', () => {
    const result = sampleMiddleSpan([1], bodyFile(), { rng: mulberry32(1), retries: 10 });
    expect(result).toEqual({ kind: 'none', reason: 'exhausted', attempts: 10 });
  });

  it('should not draw at all with a zero retry budget', () => {
    const result = sampleMiddleSpan(EXECUTED, bodyFile(), { retries: 0, rng: zeroRng });
    expect(result).toEqual({ kind: 'none', reason: 'exhausted', attempts: 0 });
  });

  it('should reject executed lines past the end of the file', () => {
    const result = sampleMiddleSpan([40, 41, 42], bodyFile(), { rng: mulberry32(2) });
    expect(result.kind).toBe('none');
  });
});
