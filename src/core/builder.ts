/**
 * Example Builder
 *
 * Picks files at random from the coverage index, samples a middle span in
 * each and cuts the file into prefix / middle / suffix. A file that yields
 * nothing (no executed lines, unreadable, no admissible span) costs one
 * retry; a successful example resets the retry counter. The run ends when
 * enough examples are collected or the retries run out.
 */

import { createLineClassifier } from './classifier.js';
import { resolveConfig } from './config.js';
import { createNullLogger } from './logger.js';
import { createRng, pickOne } from './random.js';
import { sampleMiddleSpan } from './sampler.js';
import { readSourceLines } from './source.js';
import { hasDefinitionWithBody } from './validator.js';
import type {
  BuildOptions,
  CoverageIndex,
  Example,
  ExtractionResult,
  FailureReason,
  FileFailure,
  MiddleSpan,
} from './types.js';

const COMPONENT = 'builder';

export interface SplitFile {
  prefixLines: string[];
  middleLines: string[];
  suffixLines: string[];
}

/**
 * Cut file lines around a span: prefix is everything before startLine,
 * suffix everything after endLine (both 1-indexed, inclusive).
 */
export function splitAtSpan(
  fileLines: readonly string[],
  span: Pick<MiddleSpan, 'startLine' | 'endLine'>
): SplitFile {
  return {
    prefixLines: fileLines.slice(0, span.startLine - 1),
    middleLines: fileLines.slice(span.startLine - 1, span.endLine),
    suffixLines: fileLines.slice(span.endLine),
  };
}

export function buildExamples(
  index: CoverageIndex,
  options: BuildOptions = {}
): ExtractionResult {
  const { rng: givenRng, readLines: givenReader, logger: givenLogger, ...settings } = options;
  const config = resolveConfig(settings);
  const rng = givenRng ?? createRng(config.seed);
  const readLines = givenReader ?? readSourceLines;
  const logger = givenLogger ?? createNullLogger();
  const classifier = createLineClassifier({
    indentUnit: config.indentUnit,
    definitionKeywords: config.definitionKeywords,
  });

  const files = [...index.keys()];
  const examples: Example[] = [];
  const failures: FileFailure[] = [];
  const seen = new Set<string>();
  let retries = 0;
  let attempts = 0;

  const fail = (filePath: string, reason: FailureReason, detail?: string) => {
    retries++;
    failures.push(detail === undefined ? { filePath, reason } : { filePath, reason, detail });
  };

  while (examples.length < config.targetExampleCount && retries < config.globalRetryBudget) {
    const filePath = pickOne(rng, files);
    if (filePath === undefined) break;
    attempts++;

    const executedLines = index.get(filePath)?.executedLines ?? [];
    if (executedLines.length === 0) {
      fail(filePath, 'no-executed-lines');
      continue;
    }

    let fileLines: string[];
    try {
      fileLines = readLines(filePath);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.warn(COMPONENT, `Cannot read ${filePath}`, { detail });
      fail(filePath, 'unreadable', detail);
      continue;
    }

    const result = sampleMiddleSpan(executedLines, fileLines, {
      minMiddle: config.minMiddleLines,
      maxMiddle: config.maxMiddleLines,
      retries: config.perFileRetryBudget,
      rng,
      classifier,
    });
    if (result.kind === 'none') {
      logger.debug(COMPONENT, `No admissible span in ${filePath}`, {
        reason: result.reason,
        attempts: result.attempts,
      });
      fail(filePath, 'no-span', result.reason);
      continue;
    }

    const { span } = result;
    const key = `${filePath}:${span.startLine}:${span.endLine}`;
    if (config.dedupe && seen.has(key)) {
      fail(filePath, 'duplicate');
      continue;
    }

    const { prefixLines, middleLines, suffixLines } = splitAtSpan(fileLines, span);
    if (!hasDefinitionWithBody(prefixLines, classifier)) {
      fail(filePath, 'prefix-without-body');
      continue;
    }

    const middle = middleLines.join('');
    if (middle.trim().length === 0) {
      fail(filePath, 'blank-middle');
      continue;
    }

    seen.add(key);
    examples.push({
      filePath,
      prefix: prefixLines.join(''),
      middle,
      suffix: suffixLines.join(''),
      startLine: span.startLine,
      endLine: span.endLine,
    });
    retries = 0;
  }

  logger.info(COMPONENT, `Collected ${examples.length}/${config.targetExampleCount} examples`, {
    attempts,
    failures: failures.length,
  });

  return {
    examples,
    requested: config.targetExampleCount,
    retriesUsed: retries,
    attempts,
    failures,
  };
}
