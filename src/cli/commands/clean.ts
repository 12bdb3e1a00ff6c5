import chalk from 'chalk';
import { cleanOutput, resolveOutputDir } from './output.js';

export interface CleanOptions {
  cwd?: string;
  outputDir?: string;
}

export async function cleanCommand(opts: CleanOptions = {}): Promise<void> {
  const outputDir = resolveOutputDir(opts.cwd ?? process.cwd(), opts);
  const removed = cleanOutput(outputDir);

  if (removed.length === 0) {
    console.log(chalk.dim(`Nothing to clean in ${outputDir}`));
    return;
  }
  for (const dir of removed) {
    console.log(chalk.dim(`Removed ${dir}`));
  }
  console.log(chalk.green('Cleanup completed'));
}
