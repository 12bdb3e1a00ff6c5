import { createTwoFilesPatch } from 'diff';
import type { DivergenceResult } from '../model/alignment.js';
import { describeScope } from '../model/pass.js';

type FoundDivergence = Extract<DivergenceResult, { found: true }>;

/** Header block plus a unified diff over the normalized text of the divergent pair. */
export function formatDivergenceDiff(result: FoundDivergence, generatedAt: string): string {
  const { a, b } = result.pair;
  const patch = createTwoFilesPatch(
    `a/${a.name}`,
    `b/${b.name}`,
    withTrailingNewline(result.normalizedA),
    withTrailingNewline(result.normalizedB),
  );

  return [
    'IR Divergence Diff',
    '==================',
    '',
    `Pipeline A pass: ${a.name} (#${a.index}, ${describeScope(a.scope)})`,
    `Pipeline B pass: ${b.name} (#${b.index}, ${describeScope(b.scope)})`,
    `Pair index:      ${result.index}`,
    `Generated:       ${generatedAt}`,
    '',
    'Unified diff:',
    '-------------',
    patch,
  ].join('\n');
}

function withTrailingNewline(text: string): string {
  return text === '' || text.endsWith('\n') ? text : text + '\n';
}
