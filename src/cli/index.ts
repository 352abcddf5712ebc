/**
 * fim-miner CLI
 *
 * Mine fill-in-the-middle examples from test-exercised source files.
 *
 * Usage:
 *   fim-miner extract <coverage.json> [-n count] [-o output] [options]
 *   fim-miner merge <repo-or-report...> [-o combined.json]
 *   fim-miner --help
 */

import { existsSync, mkdirSync, statSync, writeFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import pc from 'picocolors';
import { buildExamples } from '../core/builder.js';
import { createConsoleLogger } from '../core/logger.js';
import type { BuildOptions, FailureReason } from '../core/types.js';
import {
  loadCoverageIndex,
  mergeCoverageReports,
  readCoverageReport,
  type CoverageSource,
} from '../coverage/index.js';
import { writeExamples, type ExportFormat } from '../export/index.js';
import { parseArgs, type CliOptions } from './args.js';

const VERSION = '1.0.0';
const DEFAULT_EXAMPLES_OUTPUT = 'code_completion_examples.csv';
const DEFAULT_MERGE_OUTPUT = 'combined_coverage.json';

function printHelp() {
  console.log(`
${pc.bold('fim-miner')} - Fill-in-the-middle examples from test coverage

${pc.bold('USAGE')}
  fim-miner <command> [options] [files...]

${pc.bold('COMMANDS')}
  extract      Sample prefix/middle/suffix examples from a coverage report
  merge        Combine per-repository coverage.json reports into one

${pc.bold('EXTRACT OPTIONS')}
  -n, --count <n>           Examples to collect (default: 50)
  -o, --output <path>       Output file, .csv or .jsonl (default: ${DEFAULT_EXAMPLES_OUTPUT})
  -f, --format <fmt>        Force output format: csv, jsonl
  --root <dir>              Resolve report paths against dir (default: report's dir)
  --min <n>                 Minimum middle length in executed lines (default: 1)
  --max <n>                 Maximum middle length in executed lines (default: 10)
  --retries <n>             Consecutive failed attempts before stopping (default: 100)
  --file-retries <n>        Span draws per file (default: 10)
  --indent <n>              Spaces per indentation level (default: 4)
  --seed <n>                Seed for a reproducible run
  --prompt                  Add a rendered FIM prompt column
  --no-dedupe               Allow the same span to be picked twice

${pc.bold('OPTIONS')}
  -v, --verbose             Verbose output
  -h, --help                Show this help
  -V, --version             Show version

${pc.bold('EXAMPLES')}
  ${pc.dim('# Merge coverage from two repositories')}
  fim-miner merge ../service-a ../service-b -o data/combined_coverage.json

  ${pc.dim('# Collect 200 examples, reproducibly')}
  fim-miner extract data/combined_coverage.json -n 200 --seed 7 -o data/examples.csv

  ${pc.dim('# JSON Lines with prompts')}
  fim-miner extract coverage.json -o examples.jsonl --prompt
`);
}

function printVersion() {
  console.log(`fim-miner v${VERSION}`);
}

function toBuildOptions(options: CliOptions): BuildOptions {
  return {
    targetExampleCount: options.count,
    minMiddleLines: options.minMiddle,
    maxMiddleLines: options.maxMiddle,
    globalRetryBudget: options.retries,
    perFileRetryBudget: options.fileRetries,
    seed: options.seed,
    dedupe: options.dedupe,
    indentUnit:
      options.indent === undefined ? undefined : ' '.repeat(Math.max(0, Math.trunc(options.indent) || 0)),
  };
}

function toExportFormat(format: string | undefined): ExportFormat | undefined {
  if (format === undefined || format === 'csv' || format === 'jsonl') return format;
  throw new Error(`Unknown format: ${format} (expected csv or jsonl)`);
}

function commandExtract(files: string[], options: CliOptions) {
  const reportPath = files[0];
  if (reportPath === undefined) {
    console.error(pc.red('Error: No coverage report specified'));
    process.exit(1);
  }

  const format = toExportFormat(options.format);
  const outputPath = options.output ?? DEFAULT_EXAMPLES_OUTPUT;
  const logger = createConsoleLogger({ verbose: options.verbose ?? false });

  console.log(`\n${pc.bold('fim-miner extract')}\n`);

  const index = loadCoverageIndex(reportPath, options.root ? { root: options.root } : {});
  console.log(`  ${pc.dim('Files in report:')} ${index.size}`);

  const result = buildExamples(index, { ...toBuildOptions(options), logger });
  const written = writeExamples(outputPath, result.examples, {
    withPrompt: options.prompt ?? false,
    ...(format ? { format } : {}),
  });

  const counts = new Map<FailureReason, number>();
  for (const failure of result.failures) {
    counts.set(failure.reason, (counts.get(failure.reason) ?? 0) + 1);
  }

  console.log(`  ${pc.dim('Attempts:')}        ${result.attempts}`);
  for (const [reason, count] of counts) {
    console.log(`  ${pc.dim(`  ${reason}:`.padEnd(24))} ${count}`);
  }

  console.log(`\n  ${pc.dim('─'.repeat(60))}`);
  const summary = `${result.examples.length}/${result.requested}`;
  if (result.examples.length < result.requested) {
    console.log(`  ${pc.yellow('!')} ${pc.bold('Collected:')} ${pc.yellow(summary)} ${pc.dim('(retry budget exhausted)')}`);
  } else {
    console.log(`  ${pc.green('+')} ${pc.bold('Collected:')} ${pc.cyan(summary)}`);
  }
  console.log(`  ${pc.bold('Saved:')} ${outputPath} ${pc.dim(`[${written}]`)}\n`);
}

function resolveReportPath(target: string): string {
  if (existsSync(target) && statSync(target).isDirectory()) {
    return join(target, 'coverage.json');
  }
  return target;
}

function commandMerge(files: string[], options: CliOptions) {
  if (files.length === 0) {
    console.error(pc.red('Error: No repositories or reports specified'));
    process.exit(1);
  }

  const outputPath = options.output ?? DEFAULT_MERGE_OUTPUT;

  console.log(`\n${pc.bold('fim-miner merge')}\n`);

  const sources: CoverageSource[] = [];
  for (const target of files) {
    const reportPath = resolveReportPath(target);
    if (!existsSync(reportPath)) {
      console.log(`  ${pc.yellow('!')} ${target}: no coverage.json found`);
      continue;
    }

    const report = readCoverageReport(reportPath);
    sources.push({ root: dirname(reportPath), report });
    console.log(
      `  ${pc.green('+')} ${target.padEnd(40)} ${pc.dim(`${Object.keys(report.files).length} files`)}`
    );
  }

  const merged = mergeCoverageReports(sources);
  mkdirSync(dirname(resolve(outputPath)), { recursive: true });
  writeFileSync(outputPath, JSON.stringify(merged, null, 4));

  console.log(`\n  ${pc.bold('Files:')} ${Object.keys(merged.files).length}`);
  console.log(`  ${pc.bold('Saved:')} ${outputPath}\n`);
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.options.version) {
    printVersion();
    return;
  }

  if (args.options.help || !args.command) {
    printHelp();
    return;
  }

  switch (args.command) {
    case 'extract':
    case 'e':
      commandExtract(args.files, args.options);
      break;

    case 'merge':
    case 'm':
      commandMerge(args.files, args.options);
      break;

    default:
      console.error(pc.red(`Unknown command: ${args.command}`));
      console.log('Run "fim-miner --help" for usage information.');
      process.exit(1);
  }
}

main().catch((error: unknown) => {
  const logger = createConsoleLogger();
  if (error instanceof Error) {
    logger.error('cli', 'Command failed', error);
  } else {
    logger.error('cli', `Command failed: ${String(error)}`);
  }
  process.exit(1);
});
