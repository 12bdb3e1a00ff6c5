import { existsSync, rmSync } from 'node:fs';
import { resolve } from 'node:path';
import { ANALYSIS_DIR, LOGS_DIR } from '../../report/writer.js';

export const DEFAULT_OUTPUT_DIR = 'output/current';
export const ARCHIVE_DIR = 'output/archive';
export const EXTRACTED_DIR = 'extracted';
export const DB_FILE_NAME = 'irdiverge.db';
export const LOG_FILE_NAME = 'irdiverge.log';
/** Metadata key holding the version that last wrote the run database */
export const TOOL_VERSION_KEY = 'toolVersion';

/** `20261019_093005` */
export function archiveTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export function resolveOutputDir(
  cwd: string,
  opts: { outputDir?: string; archive?: string },
  now: Date = new Date(),
): string {
  if (opts.archive) {
    return resolve(cwd, ARCHIVE_DIR, `${opts.archive}_${archiveTimestamp(now)}`);
  }
  return resolve(cwd, opts.outputDir ?? DEFAULT_OUTPUT_DIR);
}

/** Remove previous extraction, analysis and log output. Returns what was removed. */
export function cleanOutput(outputDir: string): string[] {
  const removed: string[] = [];
  for (const dir of [EXTRACTED_DIR, ANALYSIS_DIR, LOGS_DIR]) {
    const target = resolve(outputDir, dir);
    if (existsSync(target)) {
      rmSync(target, { recursive: true, force: true });
      removed.push(target);
    }
  }
  return removed;
}
