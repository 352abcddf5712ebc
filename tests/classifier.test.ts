/**
 * Line Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import {
  createLineClassifier,
  isDefinitionHeader,
  isDecorator,
  isIndented,
  indentDepth,
} from '../src/core/classifier.js';

describe('isDefinitionHeader', () => {
  it('should detect top-level and nested definitions', () => {
    expect(isDefinitionHeader('def foo():\n')).toBe(true);
    expect(isDefinitionHeader('    def bar(self):\n')).toBe(true);
    expect(isDefinitionHeader('class Parser:\n')).toBe(true);
    expect(isDefinitionHeader('\tclass Inner(Base):')).toBe(true);
  });

  it('should require whitespace after the keyword', () => {
    expect(isDefinitionHeader('define = 1\n')).toBe(false);
    expect(isDefinitionHeader('classes = []\n')).toBe(false);
    expect(isDefinitionHeader('def')).toBe(false);
  });

  it('should ignore keywords in the middle of a line', () => {
    expect(isDefinitionHeader('x = build(def_value)\n')).toBe(false);
    expect(isDefinitionHeader('    return class_name\n')).toBe(false);
    expect(isDefinitionHeader('# def old():\n')).toBe(false);
  });

  it('should return false for blank lines', () => {
    expect(isDefinitionHeader('')).toBe(false);
    expect(isDefinitionHeader('    \n')).toBe(false);
  });
});

describe('isDecorator', () => {
  it('should detect decorator lines at any depth', () => {
    expect(isDecorator('@property\n')).toBe(true);
    expect(isDecorator('    @staticmethod\n')).toBe(true);
  });

  it('should not treat the matmul operator as a decorator', () => {
    expect(isDecorator('c = a @ b\n')).toBe(false);
    expect(isDecorator('')).toBe(false);
  });
});

describe('isIndented', () => {
  it('should require one full indentation unit', () => {
    expect(isIndented('    x = 1\n')).toBe(true);
    expect(isIndented('        x = 1\n')).toBe(true);
    expect(isIndented('  x = 1\n')).toBe(false);
    expect(isIndented('\tx = 1\n')).toBe(false);
    expect(isIndented('')).toBe(false);
  });
});

describe('indentDepth', () => {
  it('should count leading whitespace characters', () => {
    expect(indentDepth('x = 1\n')).toBe(0);
    expect(indentDepth('    x = 1\n')).toBe(4);
    expect(indentDepth('\t\tx = 1\n')).toBe(2);
  });

  it('should return 0 for empty and whitespace-only lines', () => {
    expect(indentDepth('')).toBe(0);
    expect(indentDepth('\n')).toBe(0);
    expect(indentDepth('        \n')).toBe(0);
  });

  it('should return the same result on repeated calls', () => {
    const line = '      value = compute()\n';
    const first = indentDepth(line);
    for (let i = 0; i < 5; i++) {
      expect(indentDepth(line)).toBe(first);
      expect(isDefinitionHeader(line)).toBe(false);
      expect(isIndented(line)).toBe(true);
    }
  });
});

describe('createLineClassifier', () => {
  it('should honour a custom indentation unit', () => {
    const classifier = createLineClassifier({ indentUnit: '\t' });
    expect(classifier.isIndented('\tx = 1\n')).toBe(true);
    expect(classifier.isIndented('    x = 1\n')).toBe(false);
  });

  it('should honour custom definition keywords', () => {
    const classifier = createLineClassifier({ definitionKeywords: ['function', 'async def'] });
    expect(classifier.isDefinitionHeader('function load() {\n')).toBe(true);
    expect(classifier.isDefinitionHeader('async  def fetch():\n')).toBe(true);
    expect(classifier.isDefinitionHeader('def sync():\n')).toBe(false);
  });

  it('should escape regex characters in keywords', () => {
    const classifier = createLineClassifier({ definitionKeywords: ['fn*'] });
    expect(classifier.isDefinitionHeader('fn* gen() {\n')).toBe(true);
    expect(classifier.isDefinitionHeader('fnnn gen() {\n')).toBe(false);
  });
});
