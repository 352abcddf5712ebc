/**
 * Coverage reports
 *
 * Reads line coverage in the coverage.py JSON layout:
 *
 * ```json
 * {
 *   "meta": { "version": "7.4.0" },
 *   "files": {
 *     "pkg/module.py": { "executed_lines": [1, 2, 5], "missing_lines": [3] }
 *   }
 * }
 * ```
 *
 * and turns it into the coverage index the builder samples from.
 */

import { readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import type { CoverageIndex, CoverageRecord } from '../core/types.js';

const fileCoverageSchema = z
  .object({
    executed_lines: z.array(z.number().int()).optional(),
  })
  .passthrough();

export const coverageReportSchema = z
  .object({
    meta: z.record(z.string(), z.unknown()).optional(),
    files: z.record(z.string(), fileCoverageSchema),
  })
  .passthrough();

export type FileCoverage = z.infer<typeof fileCoverageSchema>;
export type CoverageReport = z.infer<typeof coverageReportSchema>;

export class CoverageFormatError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'CoverageFormatError';
  }
}

export interface CoverageIndexOptions {
  /** Directory relative file paths are resolved against (default: cwd) */
  root?: string;
}

export interface CoverageSource {
  /** Repository root the report's paths are relative to */
  root: string;
  report: CoverageReport;
}

export function parseCoverageReport(data: unknown, source?: string): CoverageReport {
  const parsed = coverageReportSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new CoverageFormatError(`${where}${issue?.message ?? 'invalid coverage report'}`, source);
  }
  return parsed.data;
}

/**
 * Read and validate a coverage report from disk.
 */
export function readCoverageReport(reportPath: string): CoverageReport {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(reportPath, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CoverageFormatError(message, reportPath);
  }
  return parseCoverageReport(data, reportPath);
}

/**
 * Sort, de-duplicate and drop anything that is not a valid line number.
 */
export function normalizeExecutedLines(lines: readonly number[]): number[] {
  return [...new Set(lines.filter(line => Number.isInteger(line) && line >= 1))].sort(
    (a, b) => a - b
  );
}

export function toCoverageIndex(
  report: CoverageReport,
  options: CoverageIndexOptions = {}
): CoverageIndex {
  const root = options.root ?? process.cwd();
  const index = new Map<string, CoverageRecord>();

  for (const [filePath, coverage] of Object.entries(report.files)) {
    const absolute = isAbsolute(filePath) ? filePath : resolve(root, filePath);
    index.set(absolute, {
      executedLines: normalizeExecutedLines(coverage.executed_lines ?? []),
    });
  }

  return index;
}

/**
 * Load a report into a coverage index. Relative paths resolve against the
 * report's own directory unless a root is given.
 */
export function loadCoverageIndex(
  reportPath: string,
  options: CoverageIndexOptions = {}
): CoverageIndex {
  const report = readCoverageReport(reportPath);
  return toCoverageIndex(report, { root: options.root ?? dirname(resolve(reportPath)) });
}

/**
 * Combine per-repository reports into one. File keys become absolute paths
 * resolved against their repository root (relative roots against the cwd),
 * so the merged report can be written anywhere; meta objects are merged in
 * order.
 */
export function mergeCoverageReports(sources: readonly CoverageSource[]): CoverageReport {
  const merged: CoverageReport = { meta: {}, files: {} };

  for (const { root, report } of sources) {
    merged.meta = { ...merged.meta, ...report.meta };
    for (const [filePath, coverage] of Object.entries(report.files)) {
      const combined = resolve(root, filePath);
      merged.files[combined] = coverage;
    }
  }

  return merged;
}
