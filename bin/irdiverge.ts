#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { analyzeCommand } from '../src/cli/commands/analyze.js';
import { cleanCommand } from '../src/cli/commands/clean.js';
import { historyCommand } from '../src/cli/commands/history.js';
import { DEFAULT_OUTPUT_DIR } from '../src/cli/commands/output.js';
import { VERSION } from '../src/version.js';

const program = new Command();

program
  .name('irdiverge')
  .description('Find where two optimization pipelines first produce different IR')
  .version(VERSION);

const formatOption = new Option('-f, --format <format>', 'Output format').choices(['terminal', 'json']).default('terminal');

program
  .command('analyze')
  .description('Align the passes of two IR dumps and report the first divergence')
  .requiredOption('-a, --pipeline-a <file>', 'IR dump of pipeline A (legacy-style banners by default)')
  .requiredOption('-b, --pipeline-b <file>', 'IR dump of pipeline B (new-style banners by default)')
  .requiredOption('-m, --mapping <file>', 'Pass name mapping from pipeline A to pipeline B (.json or .yml)')
  .option('-o, --output-dir <dir>', 'Output directory', DEFAULT_OUTPUT_DIR)
  .option('--archive <name>', 'Write results to output/archive/<name>_<timestamp>/')
  .option('--fresh', 'Remove previous results before running')
  .option('--config <file>', 'Configuration file (.json, .yml or .toml)')
  .option('--store', 'Store extracted passes and the run summary in a SQLite database')
  .option('--no-rename-temporaries', 'Keep temporary value names')
  .option('--no-rename-labels', 'Keep basic block label names')
  .option('--no-drop-metadata', 'Keep metadata lines (starting with !)')
  .option('--strip-comments', 'Remove ; comments before comparing')
  .addOption(formatOption)
  .option('-v, --verbose', 'Verbose terminal output')
  .option('-q, --quiet', 'Errors only')
  .action(async (opts) => {
    await analyzeCommand({
      pipelineA: opts.pipelineA,
      pipelineB: opts.pipelineB,
      mapping: opts.mapping,
      outputDir: opts.outputDir,
      archive: opts.archive,
      fresh: opts.fresh,
      config: opts.config,
      store: opts.store,
      renameTemporaries: opts.renameTemporaries,
      renameLabels: opts.renameLabels,
      dropMetadata: opts.dropMetadata,
      stripComments: opts.stripComments,
      format: opts.format,
      verbose: opts.verbose,
      quiet: opts.quiet,
    });
  });

program
  .command('clean')
  .description('Remove extracted passes, reports and logs from a previous run')
  .option('-o, --output-dir <dir>', 'Output directory', DEFAULT_OUTPUT_DIR)
  .action(async (opts) => {
    await cleanCommand({ outputDir: opts.outputDir });
  });

program
  .command('history')
  .description('List runs recorded with --store')
  .option('-o, --output-dir <dir>', 'Output directory', DEFAULT_OUTPUT_DIR)
  .option('-n, --count <n>', 'Number of runs to show', '10')
  .option('--run <id>', 'List the stored pass blocks of one run')
  .addOption(new Option('-f, --format <format>', 'Output format').choices(['terminal', 'json']).default('terminal'))
  .action(async (opts) => {
    await historyCommand({
      outputDir: opts.outputDir,
      count: parseInt(opts.count, 10),
      run: opts.run,
      format: opts.format,
    });
  });

program.parseAsync().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`Error: ${message}`));
  if (process.argv.includes('--verbose') || process.argv.includes('-v')) {
    if (err instanceof Error && err.stack) console.error(chalk.dim(err.stack));
  }
  process.exitCode = 1;
});
