import type { AlignmentPair, DivergenceResult } from '../model/alignment.js';
import type { PassRecord } from '../model/pass.js';

const LEFT_WIDTH = 50;
const ARROW_WIDTH = 7;
const COLUMN_WIDTH = 60;
const RULE = '='.repeat(COLUMN_WIDTH * 2);

export const MAPPED_ARROW = ' <---> ';
export const DIVERGENT_ARROW = ' <-D-> ';

interface Row {
  left: string;
  arrow: string;
  right: string;
}

export function passLabel(pass: PassRecord): string {
  return `(#${String(pass.index).padStart(3)}) ${pass.name}`;
}

/**
 * Side-by-side listing of both pipelines in chronological order. Mapped
 * pairs share a row; unmapped passes sit alone in their own column, between
 * the pairs that surround them.
 */
export function layoutRows(
  passesA: readonly PassRecord[],
  passesB: readonly PassRecord[],
  pairs: readonly AlignmentPair[],
  divergentIndex: number | null,
): Row[] {
  const rows: Row[] = [];
  let prevA = -1;
  let prevB = -1;

  pairs.forEach((pair, i) => {
    for (let l = prevA + 1; l < pair.a.index; l++) {
      rows.push({ left: passLabel(passesA[l]), arrow: '', right: '' });
    }
    for (let r = prevB + 1; r < pair.b.index; r++) {
      rows.push({ left: '', arrow: '', right: passLabel(passesB[r]) });
    }
    rows.push({
      left: passLabel(pair.a),
      arrow: i === divergentIndex ? DIVERGENT_ARROW : MAPPED_ARROW,
      right: passLabel(pair.b),
    });
    prevA = pair.a.index;
    prevB = pair.b.index;
  });

  for (let l = prevA + 1; l < passesA.length; l++) {
    rows.push({ left: passLabel(passesA[l]), arrow: '', right: '' });
  }
  for (let r = prevB + 1; r < passesB.length; r++) {
    rows.push({ left: '', arrow: '', right: passLabel(passesB[r]) });
  }

  return rows;
}

export function formatRow(row: Row): string {
  return `${row.left.padEnd(LEFT_WIDTH)}${row.arrow.padEnd(ARROW_WIDTH)}${row.right}`.trimEnd();
}

export function formatVisualization(
  passesA: readonly PassRecord[],
  passesB: readonly PassRecord[],
  pairs: readonly AlignmentPair[],
  divergence: DivergenceResult,
): string {
  const divergentIndex = divergence.found ? divergence.index : null;
  const lines: string[] = [
    'PASS PIPELINE MAPPING VISUALIZATION',
    RULE,
    '',
    `PIPELINE A PASSES (${passesA.length} total)`.padEnd(COLUMN_WIDTH) + `PIPELINE B PASSES (${passesB.length} total)`,
    RULE,
    '',
  ];

  for (const row of layoutRows(passesA, passesB, pairs, divergentIndex)) {
    lines.push(formatRow(row));
  }

  lines.push(
    '',
    RULE,
    'SUMMARY:',
    `  Total Pipeline A Passes: ${passesA.length}`,
    `  Total Pipeline B Passes: ${passesB.length}`,
    `  Successfully Mapped: ${pairs.length}`,
    `  Unmapped Pipeline A: ${passesA.length - pairs.length}`,
    `  Unmapped Pipeline B: ${passesB.length - pairs.length}`,
    '',
  );

  if (divergence.found) {
    lines.push(
      'FIRST DIVERGENCE:',
      `  Pipeline A: ${divergence.pair.a.name} (#${divergence.pair.a.index})`,
      `  Pipeline B: ${divergence.pair.b.name} (#${divergence.pair.b.index})`,
      `  Marked with:${DIVERGENT_ARROW.trimEnd()}`,
    );
  } else {
    lines.push('NO DIVERGENCE FOUND');
  }

  lines.push(
    '',
    'LEGEND:',
    `  ${MAPPED_ARROW.trim()}  Mapped passes with identical IR`,
    `  ${DIVERGENT_ARROW.trim()}  First divergent pass pair`,
    '  (no arrow)  Unmapped pass',
    '',
  );

  return lines.join('\n');
}
