import type { AlignmentPair, UnmatchedReason } from '../model/alignment.js';
import type { AnalysisRun } from '../analysis/analyzer.js';
import { VERSION } from '../version.js';

export interface PairInfo {
  index: number;
  passA: string;
  passB: string;
  positionA: number;
  positionB: number;
  artifactA: string;
  artifactB: string;
}

export type DivergenceSection =
  | { found: false; message: string; totalPairs: number }
  | {
      found: true;
      firstDivergentPair: PairInfo;
      lastCommonPair: PairInfo | null;
      pairsComparedBeforeDivergence: number;
      totalPairs: number;
    };

export interface OutputFiles {
  jsonReport: string;
  diffFile: string | null;
  mappingFile: string;
  visualizationFile: string;
}

export interface DivergenceReport {
  analysis: { runId: string; timestamp: string; toolVersion: string };
  inputs: { pipelineA: string; pipelineB: string; mapping: string };
  summary: {
    totalPassesA: number;
    totalPassesB: number;
    matched: number;
    unmatched: number;
    unusedPassesB: number;
  };
  divergence: DivergenceSection;
  mapping: {
    pairs: PairInfo[];
    unmatched: Array<{ pass: string; position: number; reason: UnmatchedReason; target?: string }>;
    ambiguousTargets: Array<{ target: string; sources: string[] }>;
    successRate: number;
  };
  outputFiles?: OutputFiles;
}

export function buildReport(run: AnalysisRun): DivergenceReport {
  const { pairs, unmatched } = run.alignment;

  return {
    analysis: {
      runId: run.runId,
      timestamp: run.startedAt,
      toolVersion: VERSION,
    },
    inputs: { ...run.inputs },
    summary: {
      totalPassesA: run.passesA.length,
      totalPassesB: run.passesB.length,
      matched: pairs.length,
      unmatched: unmatched.length,
      unusedPassesB: run.passesB.length - pairs.length,
    },
    divergence: buildDivergenceSection(run),
    mapping: {
      pairs: pairs.map((pair, i) => pairInfo(pair, i)),
      unmatched: unmatched.map(u => ({
        pass: u.record.name,
        position: u.record.index,
        reason: u.reason,
        ...(u.target !== undefined ? { target: u.target } : {}),
      })),
      ambiguousTargets: run.ambiguous.map(a => ({ target: a.target, sources: [...a.sources] })),
      successRate: successRate(pairs.length, unmatched.length),
    },
  };
}

function buildDivergenceSection(run: AnalysisRun): DivergenceSection {
  const totalPairs = run.alignment.pairs.length;
  const result = run.divergence;

  if (!result.found) {
    return {
      found: false,
      message: 'No divergence found: all compared passes have identical IR',
      totalPairs,
    };
  }

  return {
    found: true,
    firstDivergentPair: pairInfo(result.pair, result.index),
    lastCommonPair: result.lastCommonPair ? pairInfo(result.lastCommonPair, result.index - 1) : null,
    pairsComparedBeforeDivergence: result.index,
    totalPairs,
  };
}

export function pairInfo(pair: AlignmentPair, index: number): PairInfo {
  return {
    index,
    passA: pair.a.name,
    passB: pair.b.name,
    positionA: pair.a.index,
    positionB: pair.b.index,
    artifactA: pair.a.artifact,
    artifactB: pair.b.artifact,
  };
}

/** matched / (matched + unmatched), or 0 when nothing was considered */
export function successRate(matched: number, unmatched: number): number {
  const total = matched + unmatched;
  return total > 0 ? matched / total : 0;
}

/** The mapping actually used by the run, as written to pass_mapping_used.json */
export function buildMappingUsed(run: AnalysisRun): Record<string, unknown> {
  const { pairs, unmatched } = run.alignment;
  return {
    pairs: pairs.map(p => ({ a: p.a.name, b: p.b.name, positionA: p.a.index, positionB: p.b.index })),
    unmatched: unmatched.map(u => u.record.name),
    statistics: {
      totalMappings: pairs.length,
      unmatchedPasses: unmatched.length,
      successRate: successRate(pairs.length, unmatched.length),
    },
  };
}
