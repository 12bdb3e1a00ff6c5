import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import chalk from 'chalk';
import { RunDatabase, type ArtifactRow, type RunRow } from '../../storage/database.js';
import { DB_FILE_NAME, TOOL_VERSION_KEY, resolveOutputDir } from './output.js';

export interface HistoryOptions {
  cwd?: string;
  outputDir?: string;
  count?: number;
  /** List the stored pass blocks of this run instead of the run summaries */
  run?: string;
  format?: 'terminal' | 'json';
}

export async function historyCommand(opts: HistoryOptions = {}): Promise<void> {
  const outputDir = resolveOutputDir(opts.cwd ?? process.cwd(), opts);
  const dbPath = resolve(outputDir, DB_FILE_NAME);

  if (!existsSync(dbPath)) {
    console.log(chalk.dim('No recorded runs. Run `irdiverge analyze --store` first.'));
    return;
  }

  const db = new RunDatabase(dbPath);
  try {
    if (opts.run) {
      printArtifacts(db, opts.run, opts.format);
      return;
    }

    const runs = db.getRuns(opts.count ?? 10);
    if (opts.format === 'json') {
      console.log(JSON.stringify(runs, null, 2));
      return;
    }
    if (runs.length === 0) {
      console.log(chalk.dim('No recorded runs.'));
      return;
    }

    const version = db.getMetadata(TOOL_VERSION_KEY);
    if (version) console.log(chalk.dim(`Recorded by irdiverge ${version}`));
    for (const run of runs) {
      console.log(formatRun(run));
    }
  } finally {
    db.close();
  }
}

function printArtifacts(db: RunDatabase, runId: string, format: HistoryOptions['format']): void {
  const artifacts = { a: db.listArtifacts(runId, 'a'), b: db.listArtifacts(runId, 'b') };
  if (format === 'json') {
    console.log(JSON.stringify(artifacts, null, 2));
    return;
  }
  if (artifacts.a.length === 0 && artifacts.b.length === 0) {
    console.log(chalk.dim(`No stored passes for run ${runId}.`));
    return;
  }
  for (const side of ['a', 'b'] as const) {
    console.log(chalk.bold(`Pipeline ${side.toUpperCase()}:`));
    for (const artifact of artifacts[side]) {
      console.log(formatArtifact(artifact));
    }
  }
}

export function formatRun(run: RunRow): string {
  const outcome = run.divergenceFound
    ? chalk.red(`diverged at pair #${run.divergenceIndex}: ${run.divergentA} / ${run.divergentB}`)
    : chalk.green('no divergence');
  return `${chalk.yellow(run.id)}  ${run.startedAt}  ${run.matched}/${run.matched + run.unmatched} mapped  ${outcome}`;
}

export function formatArtifact(artifact: ArtifactRow): string {
  return `  ${artifact.name}  ${chalk.dim(artifact.contentHash.slice(0, 8))}`;
}
