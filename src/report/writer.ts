import { mkdirSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { AnalysisRun } from '../analysis/analyzer.js';
import { buildMappingUsed, buildReport, type DivergenceReport, type OutputFiles } from './report.js';
import { formatDivergenceDiff } from './diff.js';
import { formatVisualization } from './visualization.js';

export const ANALYSIS_DIR = 'analysis';
export const LOGS_DIR = 'logs';

/** Write every report artifact for `run` under `outputDir`. */
export function writeReports(outputDir: string, run: AnalysisRun): DivergenceReport {
  const analysisDir = resolve(outputDir, ANALYSIS_DIR);
  const logsDir = resolve(outputDir, LOGS_DIR);
  mkdirSync(analysisDir, { recursive: true });
  mkdirSync(logsDir, { recursive: true });

  const report = buildReport(run);

  const files: OutputFiles = {
    jsonReport: resolve(analysisDir, 'divergence_report.json'),
    diffFile: null,
    mappingFile: resolve(analysisDir, 'pass_mapping_used.json'),
    visualizationFile: resolve(logsDir, 'pass_mapping_visualization.txt'),
  };

  if (run.divergence.found) {
    files.diffFile = resolve(analysisDir, 'first_divergence_diff.txt');
    writeFileSync(files.diffFile, formatDivergenceDiff(run.divergence, run.startedAt));
  }

  writeFileSync(files.mappingFile, JSON.stringify(buildMappingUsed(run), null, 2));
  writeFileSync(
    files.visualizationFile,
    formatVisualization(run.passesA, run.passesB, run.alignment.pairs, run.divergence),
  );

  report.outputFiles = files;
  writeFileSync(files.jsonReport, JSON.stringify(report, null, 2));

  return report;
}
