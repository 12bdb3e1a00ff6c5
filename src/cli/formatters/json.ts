import type { DivergenceReport } from '../../report/report.js';

export function formatJson(report: DivergenceReport): string {
  return JSON.stringify(report, null, 2);
}
