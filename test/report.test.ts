import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { align } from '../src/align/aligner.js';
import { findFirstDivergence } from '../src/compare/divergence.js';
import type { AnalysisRun } from '../src/analysis/analyzer.js';
import { buildMappingUsed, buildReport, successRate } from '../src/report/report.js';
import { formatDivergenceDiff } from '../src/report/diff.js';
import { formatRow, formatVisualization, layoutRows } from '../src/report/visualization.js';
import { formatTerminal } from '../src/cli/formatters/terminal.js';
import { formatJson } from '../src/cli/formatters/json.js';
import { VERSION } from '../src/version.js';
import { makePass, makePasses } from './helpers.js';

const STARTED_AT = '2026-10-19T09:30:05.000Z';

function scenarioRun(contentB2 = 'ret i32 1'): AnalysisRun {
  const passesA = makePasses(['InstCombine', 'early-cse'], ['ret void', 'ret i32 0']);
  const passesB = makePasses(['instcombine', 'simplifycfg', 'early-cse'], ['ret void', 'br label %x', contentB2]);
  const mapping = new Map([['InstCombine', 'instcombine'], ['early-cse', 'early-cse']]);
  const alignment = align(passesA, passesB, mapping);

  return {
    runId: 'run-1',
    startedAt: STARTED_AT,
    inputs: { pipelineA: 'a.txt', pipelineB: 'b.txt', mapping: 'map.json' },
    passesA,
    passesB,
    mapping,
    ambiguous: [],
    alignment,
    divergence: findFirstDivergence(alignment.pairs),
  };
}

describe('buildReport', () => {
  it('summarizes the run and locates the divergence', () => {
    const report = buildReport(scenarioRun());

    expect(report.analysis).toEqual({ runId: 'run-1', timestamp: STARTED_AT, toolVersion: VERSION });
    expect(report.summary).toEqual({
      totalPassesA: 2,
      totalPassesB: 3,
      matched: 2,
      unmatched: 0,
      unusedPassesB: 1,
    });
    expect(report.divergence).toEqual({
      found: true,
      firstDivergentPair: {
        index: 1,
        passA: 'early-cse',
        passB: 'early-cse',
        positionA: 1,
        positionB: 2,
        artifactA: '1_early-cse',
        artifactB: '2_early-cse',
      },
      lastCommonPair: {
        index: 0,
        passA: 'InstCombine',
        passB: 'instcombine',
        positionA: 0,
        positionB: 0,
        artifactA: '0_InstCombine',
        artifactB: '0_instcombine',
      },
      pairsComparedBeforeDivergence: 1,
      totalPairs: 2,
    });
    expect(report.mapping.successRate).toBe(1);
    expect(report.outputFiles).toBeUndefined();
  });

  it('reports the absence of a divergence', () => {
    const report = buildReport(scenarioRun('ret i32 0'));
    expect(report.divergence).toEqual({
      found: false,
      message: 'No divergence found: all compared passes have identical IR',
      totalPairs: 2,
    });
  });

  it('lists unmatched passes with their reasons', () => {
    const run = scenarioRun();
    const passesA = makePasses(['InstCombine', 'licm']);
    run.passesA = passesA;
    run.alignment = align(passesA, run.passesB, run.mapping);

    const report = buildReport(run);

    expect(report.mapping.unmatched).toEqual([{ pass: 'licm', position: 1, reason: 'unmapped' }]);
    expect(report.mapping.successRate).toBe(0.5);
  });

  it('serializes as indented JSON', () => {
    const report = buildReport(scenarioRun());
    expect(JSON.parse(formatJson(report))).toEqual(report);
    expect(formatJson(report).split('\n')[1]).toBe('  "analysis": {');
  });
});

describe('successRate', () => {
  it('is zero when nothing was considered', () => {
    expect(successRate(0, 0)).toBe(0);
    expect(successRate(3, 1)).toBe(0.75);
  });
});

describe('buildMappingUsed', () => {
  it('records the pairs actually used', () => {
    expect(buildMappingUsed(scenarioRun())).toEqual({
      pairs: [
        { a: 'InstCombine', b: 'instcombine', positionA: 0, positionB: 0 },
        { a: 'early-cse', b: 'early-cse', positionA: 1, positionB: 2 },
      ],
      unmatched: [],
      statistics: { totalMappings: 2, unmatchedPasses: 0, successRate: 1 },
    });
  });
});

describe('formatDivergenceDiff', () => {
  it('prints a header block followed by a unified diff', () => {
    const { divergence } = scenarioRun();
    if (!divergence.found) throw new Error('expected a divergence');

    const lines = formatDivergenceDiff(divergence, STARTED_AT).split('\n');

    expect(lines.slice(0, 10)).toEqual([
      'IR Divergence Diff',
      '==================',
      '',
      'Pipeline A pass: early-cse (#1, scope unknown)',
      'Pipeline B pass: early-cse (#2, scope unknown)',
      'Pair index:      1',
      `Generated:       ${STARTED_AT}`,
      '',
      'Unified diff:',
      '-------------',
    ]);
    expect(lines).toContain('--- a/early-cse');
    expect(lines).toContain('+++ b/early-cse');
    expect(lines).toContain('-ret i32 0');
    expect(lines).toContain('+ret i32 1');
  });

  it('names the scope of each pass', () => {
    const a = makePass('instcombine', 1, 'ret void');
    const b = makePass('InstCombinePass', 4, 'unreachable', { kind: 'function', target: 'main' });
    const divergence = findFirstDivergence([{ a, b }]);
    if (!divergence.found) throw new Error('expected a divergence');

    const lines = formatDivergenceDiff(divergence, STARTED_AT).split('\n');

    expect(lines[3]).toBe('Pipeline A pass: instcombine (#1, scope unknown)');
    expect(lines[4]).toBe('Pipeline B pass: InstCombinePass (#4, function main)');
  });
});

describe('visualization', () => {
  it('places B-only passes between the pairs around them', () => {
    const run = scenarioRun();
    const rows = layoutRows(run.passesA, run.passesB, run.alignment.pairs, 1).map(formatRow);

    expect(rows).toEqual([
      '(#  0) InstCombine' + ' '.repeat(32) + ' <---> (#  0) instcombine',
      ' '.repeat(57) + '(#  1) simplifycfg',
      '(#  1) early-cse' + ' '.repeat(34) + ' <-D-> (#  2) early-cse',
    ]);
  });

  it('lists trailing unmapped passes in their own column', () => {
    const passesA = makePasses(['a', 'b']);
    const passesB = makePasses(['A']);
    const rows = layoutRows(passesA, passesB, [{ a: passesA[0], b: passesB[0] }], null).map(formatRow);

    expect(rows).toEqual(['(#  0) a' + ' '.repeat(42) + ' <---> (#  0) A', '(#  1) b']);
  });

  it('summarizes counts and names the divergent pair', () => {
    const run = scenarioRun();
    const lines = formatVisualization(run.passesA, run.passesB, run.alignment.pairs, run.divergence).split('\n');

    expect(lines[0]).toBe('PASS PIPELINE MAPPING VISUALIZATION');
    expect(lines[3]).toBe('PIPELINE A PASSES (2 total)'.padEnd(60) + 'PIPELINE B PASSES (3 total)');
    expect(lines).toContain('  Successfully Mapped: 2');
    expect(lines).toContain('  Unmapped Pipeline A: 0');
    expect(lines).toContain('  Unmapped Pipeline B: 1');
    expect(lines).toContain('  Pipeline A: early-cse (#1)');
    expect(lines).toContain('  Pipeline B: early-cse (#2)');
    expect(lines).toContain('  Marked with: <-D->');
  });

  it('says so when nothing diverged', () => {
    const run = scenarioRun('ret i32 0');
    const text = formatVisualization(run.passesA, run.passesB, run.alignment.pairs, run.divergence);

    expect(text.split('\n')).toContain('NO DIVERGENCE FOUND');
    expect(text.split('\n')).toContain('  <-D->  First divergent pass pair');
  });
});

describe('formatTerminal', () => {
  it('prints the summary and both pairs around the divergence', () => {
    expect(chalk.level).toBe(0);
    const lines = formatTerminal(buildReport(scenarioRun())).split('\n');

    expect(lines).toContain('   Success rate:        100.0%');
    expect(lines).toContain('FIRST DIVERGENCE FOUND:');
    expect(lines).toContain('   Pipeline A:    "early-cse" (#1 in pipeline A)');
    expect(lines).toContain('   Pipeline B:    "early-cse" (#2 in pipeline B)');
    expect(lines).toContain('LAST COMMON PASS:');
    expect(lines).toContain('   Position:      pass pair #0');
  });

  it('lists output files when present', () => {
    const report = buildReport(scenarioRun('ret i32 0'));
    report.outputFiles = {
      jsonReport: '/out/analysis/divergence_report.json',
      diffFile: null,
      mappingFile: '/out/analysis/pass_mapping_used.json',
      visualizationFile: '/out/logs/pass_mapping_visualization.txt',
    };

    const lines = formatTerminal(report).split('\n');

    expect(lines).toContain('NO DIVERGENCE FOUND!');
    expect(lines).toContain('   All 2 compared passes have identical IR');
    expect(lines).toContain('   JSON report:   /out/analysis/divergence_report.json');
    expect(lines.some(l => l.startsWith('   Diff file:'))).toBe(false);
  });

  it('warns about ambiguous targets', () => {
    const run = scenarioRun();
    run.ambiguous = [{ target: 'instcombine', sources: ['InstCombine', 'instcombine'] }];
    expect(formatTerminal(buildReport(run)).split('\n')).toContain('   Ambiguous targets:   instcombine');
  });
});
