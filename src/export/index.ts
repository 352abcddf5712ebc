/**
 * Example serialization (CSV and JSON Lines)
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, extname } from 'node:path';
import { formatFimPrompt } from '../core/fim.js';
import type { Example } from '../core/types.js';

export type ExportFormat = 'csv' | 'jsonl';

export interface ExportOptions {
  /** Add a rendered FIM prompt column (default: false) */
  withPrompt?: boolean;
}

export interface WriteOptions extends ExportOptions {
  /** Output format (default: inferred from the file extension) */
  format?: ExportFormat;
}

const CSV_COLUMNS = ['file_path', 'prefix', 'middle', 'suffix'] as const;

/**
 * Quote a CSV field when it holds a comma, quote or line break.
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsv(examples: readonly Example[], options: ExportOptions = {}): string {
  const header: string[] = [...CSV_COLUMNS];
  if (options.withPrompt) header.push('prompt');

  const rows = [header.join(',')];
  for (const example of examples) {
    const fields = [example.filePath, example.prefix, example.middle, example.suffix];
    if (options.withPrompt) fields.push(formatFimPrompt(example));
    rows.push(fields.map(escapeCsvField).join(','));
  }

  return rows.join('\n') + '\n';
}

export function toJsonl(examples: readonly Example[], options: ExportOptions = {}): string {
  return examples
    .map(example =>
      JSON.stringify({
        file_path: example.filePath,
        prefix: example.prefix,
        middle: example.middle,
        suffix: example.suffix,
        start_line: example.startLine,
        end_line: example.endLine,
        ...(options.withPrompt ? { prompt: formatFimPrompt(example) } : {}),
      }) + '\n'
    )
    .join('');
}

export function detectFormat(outputPath: string): ExportFormat {
  const ext = extname(outputPath).toLowerCase();
  return ext === '.jsonl' || ext === '.ndjson' ? 'jsonl' : 'csv';
}

/**
 * Write examples to disk, creating the output directory if needed.
 */
export function writeExamples(
  outputPath: string,
  examples: readonly Example[],
  options: WriteOptions = {}
): ExportFormat {
  const format = options.format ?? detectFormat(outputPath);
  const content = format === 'jsonl' ? toJsonl(examples, options) : toCsv(examples, options);

  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, content);

  return format;
}
