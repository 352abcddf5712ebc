/**
 * Structural Validator Tests
 */

import { describe, it, expect } from 'vitest';
import {
  hasDefinitionWithBody,
  forbiddenIndentDepths,
  isAdmissibleMiddle,
} from '../src/core/validator.js';

const NESTED = [
  'class Account:\n',
  '    def deposit(self, amount):\n',
  '        self.balance += amount\n',
  'def audit():\n',
  '    return True\n',
];

const FUNCTION = [
  'def handler(event):\n',
  '    total = 0\n',
  '    count = 1\n',
  '    @cached\n',
  '    def inner():\n',
  'result = handler(None)\n',
  '\n',
];

describe('hasDefinitionWithBody', () => {
  it('should accept a definition followed by an indented line', () => {
    expect(hasDefinitionWithBody(['def f():\n', '    return 1\n'])).toBe(true);
    expect(hasDefinitionWithBody(['import os\n', 'class A:\n', '    pass\n'])).toBe(true);
  });

  it('should reject a header without an indented body line', () => {
    expect(hasDefinitionWithBody(['def f():\n', 'return 1\n'])).toBe(false);
    expect(hasDefinitionWithBody(['def f():\n', '  return 1\n'])).toBe(false);
  });

  it('should reject a header on the last line', () => {
    expect(hasDefinitionWithBody(['x = 1\n', 'def f():\n'])).toBe(false);
  });

  it('should reject empty input', () => {
    expect(hasDefinitionWithBody([])).toBe(false);
  });
});

describe('forbiddenIndentDepths', () => {
  it('should collect header depths above the start line', () => {
    expect([...forbiddenIndentDepths(NESTED, 4)].sort()).toEqual([0, 4]);
    expect([...forbiddenIndentDepths(NESTED, 3)].sort()).toEqual([0, 4]);
    expect([...forbiddenIndentDepths(NESTED, 2)]).toEqual([0]);
  });

  it('should be empty when nothing precedes the start line', () => {
    expect(forbiddenIndentDepths(NESTED, 1).size).toBe(0);
  });

  it('should stop at the end of the file', () => {
    expect([...forbiddenIndentDepths(NESTED, 100)].sort()).toEqual([0, 4]);
  });
});

describe('isAdmissibleMiddle', () => {
  const topLevel = new Set([0]);

  it('should accept body statements away from forbidden depths', () => {
    expect(isAdmissibleMiddle(FUNCTION, [2, 3], topLevel)).toBe(true);
  });

  it('should reject spans containing a decorator', () => {
    expect(isAdmissibleMiddle(FUNCTION, [2, 3, 4], topLevel)).toBe(false);
  });

  it('should reject spans containing a definition header', () => {
    expect(isAdmissibleMiddle(FUNCTION, [5], topLevel)).toBe(false);
  });

  it('should reject lines at a forbidden depth', () => {
    expect(isAdmissibleMiddle(FUNCTION, [6], topLevel)).toBe(false);
    expect(isAdmissibleMiddle(FUNCTION, [3, 6], topLevel)).toBe(false);
  });

  it('should treat blank lines as depth 0', () => {
    expect(isAdmissibleMiddle(FUNCTION, [7], topLevel)).toBe(false);
    expect(isAdmissibleMiddle(FUNCTION, [7], new Set([4]))).toBe(true);
  });

  it('should reject a first line at a forbidden depth', () => {
    expect(isAdmissibleMiddle(FUNCTION, [2], new Set([4]))).toBe(false);
  });

  it('should reject empty spans and lines outside the file', () => {
    expect(isAdmissibleMiddle(FUNCTION, [], topLevel)).toBe(false);
    expect(isAdmissibleMiddle(FUNCTION, [2, 99], topLevel)).toBe(false);
    expect(isAdmissibleMiddle(FUNCTION, [0], topLevel)).toBe(false);
  });
});
