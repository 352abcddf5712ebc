/**
 * fim-miner Core Types
 */

import type { Logger } from './logger.js';
import type { Rng } from './random.js';

/** Ascending, de-duplicated 1-indexed line numbers that ran at least once. */
export interface CoverageRecord {
  executedLines: readonly number[];
}

/** File path -> coverage record. Read-only for the whole run. */
export type CoverageIndex = ReadonlyMap<string, CoverageRecord>;

/** Reads a file as raw lines, each keeping its line terminator. */
export type LineReader = (filePath: string) => string[];

export interface ClassifierOptions {
  /** Canonical one-level indentation (default: four spaces) */
  indentUnit?: string;
  /** Keywords that open a definition (default: ['def', 'class']) */
  definitionKeywords?: readonly string[];
}

export interface LineClassifier {
  isDefinitionHeader(line: string): boolean;
  isDecorator(line: string): boolean;
  isIndented(line: string): boolean;
  indentDepth(line: string): number;
}

/** A validated middle span, in absolute file line numbers. */
export interface MiddleSpan {
  /** First middle line (1-indexed) */
  startLine: number;
  /** Last middle line (1-indexed, inclusive) */
  endLine: number;
  /** Every line number from startLine to endLine */
  lineNumbers: number[];
  /** Index into executedLines the draw started from */
  startIndex: number;
  /** Index into executedLines the draw ended at */
  endIndex: number;
}

export type NoSpanReason = 'empty' | 'too-few-lines' | 'exhausted';

export type SpanResult =
  | { kind: 'span'; span: MiddleSpan; attempts: number }
  | { kind: 'none'; reason: NoSpanReason; attempts: number };

export interface SampleOptions {
  /** Minimum middle length in executed lines (default: 1) */
  minMiddle?: number;
  /** Maximum middle length in executed lines (default: 10) */
  maxMiddle?: number;
  /** Draws before giving up on the file (default: 10) */
  retries?: number;
  /** Random source (default: Math.random) */
  rng?: Rng;
  classifier?: LineClassifier;
}

export interface Example {
  filePath: string;
  prefix: string;
  middle: string;
  suffix: string;
  /** First middle line (1-indexed) */
  startLine: number;
  /** Last middle line (1-indexed, inclusive) */
  endLine: number;
}

export type FailureReason =
  | 'no-executed-lines'
  | 'unreadable'
  | 'no-span'
  | 'prefix-without-body'
  | 'blank-middle'
  | 'duplicate';

export interface FileFailure {
  filePath: string;
  reason: FailureReason;
  detail?: string;
}

export interface ExtractionResult {
  examples: Example[];
  /** Number of examples asked for */
  requested: number;
  /** Consecutive failed attempts when the run stopped */
  retriesUsed: number;
  /** Total file selections made */
  attempts: number;
  failures: FileFailure[];
}

export interface BuildOptions {
  /** Number of examples to collect (default: 50) */
  targetExampleCount?: number;
  /** Consecutive failed attempts before giving up (default: 100) */
  globalRetryBudget?: number;
  /** Span draws per file (default: 10) */
  perFileRetryBudget?: number;
  minMiddleLines?: number;
  maxMiddleLines?: number;
  indentUnit?: string;
  definitionKeywords?: readonly string[];
  /** Skip examples whose (file, start, end) was already taken (default: true) */
  dedupe?: boolean;
  /** Seed for a reproducible run; ignored when rng is given */
  seed?: number;
  rng?: Rng;
  readLines?: LineReader;
  logger?: Logger;
}
