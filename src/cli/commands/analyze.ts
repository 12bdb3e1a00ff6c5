import { mkdirSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { analyze, type AnalysisRun, type StoreFactory } from '../../analysis/analyzer.js';
import { loadConfig, type IrDivergeConfig } from '../../config/config.js';
import { combineLoggers, createConsoleLogger, createFileLogger } from '../../logging/logger.js';
import { createDefaultRegistry } from '../../parser/dialects/index.js';
import { FileArtifactStore } from '../../storage/artifact-store.js';
import { RunDatabase, type RunRow } from '../../storage/database.js';
import { LOGS_DIR, writeReports } from '../../report/writer.js';
import { VERSION } from '../../version.js';
import { formatTerminal } from '../formatters/terminal.js';
import { formatJson } from '../formatters/json.js';
import {
  DB_FILE_NAME,
  EXTRACTED_DIR,
  TOOL_VERSION_KEY,
  LOG_FILE_NAME,
  cleanOutput,
  resolveOutputDir,
} from './output.js';

export interface AnalyzeCommandOptions {
  cwd?: string;
  pipelineA: string;
  pipelineB: string;
  mapping: string;
  outputDir?: string;
  archive?: string;
  fresh?: boolean;
  config?: string;
  store?: boolean;
  // commander sets these to false for --no-* flags and leaves them true otherwise
  renameTemporaries?: boolean;
  renameLabels?: boolean;
  dropMetadata?: boolean;
  stripComments?: boolean;
  format?: 'terminal' | 'json';
  verbose?: boolean;
  quiet?: boolean;
}

export async function analyzeCommand(opts: AnalyzeCommandOptions): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const outputDir = resolveOutputDir(cwd, opts);

  if (opts.fresh) {
    for (const dir of cleanOutput(outputDir)) {
      if (!opts.quiet) console.error(chalk.dim(`Removed ${dir}`));
    }
  }
  mkdirSync(outputDir, { recursive: true });

  const { config, source } = await loadConfig(cwd, opts.config);
  applyFlags(config, opts);

  const logger = combineLoggers(
    createConsoleLogger({ verbose: opts.verbose, quiet: opts.quiet }),
    createFileLogger(resolve(outputDir, LOGS_DIR, LOG_FILE_NAME)),
  );
  logger.info(`Output directory: ${outputDir}`);
  if (source) logger.info(`Using configuration from ${source}`);

  const db = opts.store ? new RunDatabase(resolve(outputDir, DB_FILE_NAME)) : undefined;

  try {
    const run = await analyze(
      {
        pipelineA: resolve(cwd, opts.pipelineA),
        pipelineB: resolve(cwd, opts.pipelineB),
        mapping: resolve(cwd, opts.mapping),
      },
      { logger, config, registry: createDefaultRegistry() },
      storeFactory(outputDir, db),
    );

    const report = writeReports(outputDir, run);
    if (db) {
      db.insertRun(toRunRow(run));
      db.setMetadata(TOOL_VERSION_KEY, VERSION);
    }
    logger.info('Analysis completed successfully');

    if (opts.format === 'json') {
      console.log(formatJson(report));
    } else if (!opts.quiet) {
      console.log(formatTerminal(report));
    }
  } finally {
    db?.close();
  }
}

/** CLI switches only ever turn a configured default off (or comments on). */
export function applyFlags(config: IrDivergeConfig, opts: AnalyzeCommandOptions): void {
  if (opts.renameTemporaries === false) config.normalize.renameTemporaries = false;
  if (opts.renameLabels === false) config.normalize.renameLabels = false;
  if (opts.dropMetadata === false) config.normalize.dropMetadata = false;
  if (opts.stripComments) config.normalize.stripComments = true;
}

function storeFactory(outputDir: string, db: RunDatabase | undefined): StoreFactory {
  if (db) {
    const database = db;
    return (side, runId) => database.artifactStore(runId, side);
  }
  return side => new FileArtifactStore(resolve(outputDir, EXTRACTED_DIR, side));
}

export function toRunRow(run: AnalysisRun): RunRow {
  const { divergence } = run;
  return {
    id: run.runId,
    startedAt: run.startedAt,
    pipelineA: run.inputs.pipelineA,
    pipelineB: run.inputs.pipelineB,
    passesA: run.passesA.length,
    passesB: run.passesB.length,
    matched: run.alignment.pairs.length,
    unmatched: run.alignment.unmatched.length,
    divergenceFound: divergence.found,
    ...(divergence.found
      ? {
          divergenceIndex: divergence.index,
          divergentA: divergence.pair.a.name,
          divergentB: divergence.pair.b.name,
        }
      : {}),
  };
}
