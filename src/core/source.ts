import { readFileSync } from 'node:fs';

/**
 * Split text into lines, each keeping its terminator ('\n' or '\r\n').
 * The last line has no terminator when the text does not end with one.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/**
 * Read a source file as raw lines. Throws when the file cannot be read.
 */
export function readSourceLines(filePath: string): string[] {
  return splitLines(readFileSync(filePath, 'utf8'));
}
