import chalk from 'chalk';
import type { DivergenceReport, PairInfo } from '../../report/report.js';

const RULE = '='.repeat(60);

function pairLines(pair: PairInfo): string[] {
  return [
    `   Position:      pass pair #${pair.index}`,
    `   Pipeline A:    ${chalk.bold(`"${pair.passA}"`)} (#${pair.positionA} in pipeline A)`,
    `   Pipeline B:    ${chalk.bold(`"${pair.passB}"`)} (#${pair.positionB} in pipeline B)`,
  ];
}

export function formatTerminal(report: DivergenceReport): string {
  const { summary, divergence, mapping } = report;
  const lines: string[] = [
    '',
    RULE,
    chalk.bold('IR DIVERGENCE ANALYSIS RESULTS'),
    RULE,
    'SUMMARY:',
    `   Pipeline A passes:   ${summary.totalPassesA}`,
    `   Pipeline B passes:   ${summary.totalPassesB}`,
    `   Successfully mapped: ${summary.matched}`,
    `   Unmatched passes:    ${summary.unmatched}`,
    `   Success rate:        ${(mapping.successRate * 100).toFixed(1)}%`,
  ];

  if (mapping.ambiguousTargets.length > 0) {
    lines.push(chalk.yellow(`   Ambiguous targets:   ${mapping.ambiguousTargets.map(t => t.target).join(', ')}`));
  }

  if (divergence.found) {
    lines.push('', chalk.red.bold('FIRST DIVERGENCE FOUND:'), ...pairLines(divergence.firstDivergentPair));
    if (divergence.lastCommonPair) {
      lines.push('', chalk.green('LAST COMMON PASS:'), ...pairLines(divergence.lastCommonPair));
    }
  } else {
    lines.push(
      '',
      chalk.green.bold('NO DIVERGENCE FOUND!'),
      `   All ${divergence.totalPairs} compared passes have identical IR`,
    );
  }

  const files = report.outputFiles;
  if (files) {
    lines.push('', 'OUTPUT FILES:', chalk.dim(`   JSON report:   ${files.jsonReport}`));
    if (files.diffFile) lines.push(chalk.dim(`   Diff file:     ${files.diffFile}`));
    lines.push(
      chalk.dim(`   Mapping info:  ${files.mappingFile}`),
      chalk.dim(`   Visualization: ${files.visualizationFile}`),
    );
  }

  lines.push(RULE, '');
  return lines.join('\n');
}
