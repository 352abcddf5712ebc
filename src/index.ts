/**
 * fim-miner - Fill-in-the-middle examples from test coverage
 *
 * @example
 * ```ts
 * import { loadCoverageIndex, buildExamples, writeExamples } from 'fim-miner';
 *
 * const index = loadCoverageIndex('data/combined_coverage.json');
 * const result = buildExamples(index, { targetExampleCount: 100, seed: 7 });
 *
 * console.log(`Collected ${result.examples.length}/${result.requested}`);
 * writeExamples('data/examples.csv', result.examples);
 * ```
 *
 * @packageDocumentation
 */

// Core
export {
  createLineClassifier,
  defaultClassifier,
  isDefinitionHeader,
  isDecorator,
  isIndented,
  indentDepth,
} from './core/classifier.js';
export {
  hasDefinitionWithBody,
  forbiddenIndentDepths,
  isAdmissibleMiddle,
} from './core/validator.js';
export { sampleMiddleSpan, candidateSpan } from './core/sampler.js';
export { buildExamples, splitAtSpan } from './core/builder.js';
export type { SplitFile } from './core/builder.js';
export { splitLines, readSourceLines } from './core/source.js';
export { formatFimPrompt, STARCODER_FIM_TOKENS } from './core/fim.js';
export type { FimTokens } from './core/fim.js';
export { mulberry32, createRng, randomNormal, randomInt, pickOne } from './core/random.js';
export type { Rng } from './core/random.js';
export {
  resolveConfig,
  extractionConfigSchema,
  ConfigError,
  DEFAULT_INDENT_UNIT,
  DEFAULT_DEFINITION_KEYWORDS,
} from './core/config.js';
export type { ExtractionConfig, ExtractionConfigInput } from './core/config.js';
export { createConsoleLogger, createNullLogger } from './core/logger.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './core/logger.js';

// Types
export type {
  CoverageRecord,
  CoverageIndex,
  LineReader,
  ClassifierOptions,
  LineClassifier,
  MiddleSpan,
  NoSpanReason,
  SpanResult,
  SampleOptions,
  Example,
  FailureReason,
  FileFailure,
  ExtractionResult,
  BuildOptions,
} from './core/types.js';

// Coverage reports
export {
  parseCoverageReport,
  readCoverageReport,
  normalizeExecutedLines,
  toCoverageIndex,
  loadCoverageIndex,
  mergeCoverageReports,
  coverageReportSchema,
  CoverageFormatError,
} from './coverage/index.js';
export type {
  CoverageReport,
  FileCoverage,
  CoverageSource,
  CoverageIndexOptions,
} from './coverage/index.js';

// Export
export { toCsv, toJsonl, escapeCsvField, detectFormat, writeExamples } from './export/index.js';
export type { ExportFormat, ExportOptions, WriteOptions } from './export/index.js';
