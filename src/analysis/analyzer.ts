import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import type { PassRecord, PipelineSide } from '../model/pass.js';
import type {
  AlignmentResult,
  AmbiguousTarget,
  DivergenceResult,
  ExclusionSets,
  NameMapping,
} from '../model/alignment.js';
import type { ArtifactStore } from '../storage/artifact-store.js';
import type { HeaderDialect } from '../parser/plugin.js';
import type { RunContext } from './context.js';
import { scanHeaders } from '../parser/scanner.js';
import { extract } from '../parser/extractor.js';
import { align, findAmbiguousTargets } from '../align/aligner.js';
import { loadMapping } from '../align/mapping.js';
import { findFirstDivergence } from '../compare/divergence.js';
import { ConfigError, MissingInputError } from '../errors.js';

export interface AnalyzeInputs {
  pipelineA: string;
  pipelineB: string;
  mapping: string;
}

/** Creates the artifact store for one pipeline of a run. */
export type StoreFactory = (side: PipelineSide, runId: string) => ArtifactStore;

export interface AnalysisRun {
  runId: string;
  startedAt: string;
  inputs: AnalyzeInputs;
  passesA: PassRecord[];
  passesB: PassRecord[];
  mapping: NameMapping;
  ambiguous: AmbiguousTarget[];
  alignment: AlignmentResult;
  divergence: DivergenceResult;
}

export interface AnalyzeOptions {
  runId?: string;
  now?: () => Date;
}

/**
 * One full run: read both dumps and the mapping, extract passes, align them
 * and scan for the first divergence. Fatal conditions throw; unmatched passes
 * and ambiguous targets are returned in the result.
 */
export async function analyze(
  inputs: AnalyzeInputs,
  ctx: RunContext,
  stores: StoreFactory,
  opts: AnalyzeOptions = {},
): Promise<AnalysisRun> {
  const { logger, config } = ctx;
  const runId = opts.runId ?? randomUUID();
  const startedAt = (opts.now ?? (() => new Date()))().toISOString();

  const dialectA = resolveDialect(ctx, config.dialects.a);
  const dialectB = resolveDialect(ctx, config.dialects.b);

  logger.info(`Pipeline A dump: ${inputs.pipelineA} (${dialectA.id})`);
  logger.info(`Pipeline B dump: ${inputs.pipelineB} (${dialectB.id})`);
  logger.info(`Pass mapping: ${inputs.mapping}`);

  // Inputs are validated before any scanning starts
  const [textA, textB, mapping] = await Promise.all([
    readDump('Pipeline A', inputs.pipelineA),
    readDump('Pipeline B', inputs.pipelineB),
    loadMapping(inputs.mapping),
  ]);
  logger.info(`Loaded ${mapping.size} pass mappings`);

  const ambiguous = findAmbiguousTargets(mapping);
  for (const entry of ambiguous) {
    logger.warn(`Pass ${entry.target} is the target of several mappings: ${entry.sources.join(', ')}`);
  }

  const passesA = extractPipeline(textA, dialectA, stores('a', runId), ctx, 'A');
  const passesB = extractPipeline(textB, dialectB, stores('b', runId), ctx, 'B');

  const exclusions: ExclusionSets = {
    a: new Set(config.exclude.a),
    b: new Set(config.exclude.b),
  };
  const alignment = align(passesA, passesB, mapping, exclusions, { logger });
  const divergence = findFirstDivergence(alignment.pairs, config.normalize, { logger });

  return {
    runId,
    startedAt,
    inputs,
    passesA,
    passesB,
    mapping,
    ambiguous,
    alignment,
    divergence,
  };
}

function resolveDialect(ctx: RunContext, id: string): HeaderDialect {
  const dialect = ctx.registry.get(id);
  if (!dialect) {
    const known = ctx.registry.list().map(d => d.id).join(', ');
    throw new ConfigError('dialects', `unknown dialect "${id}" (known: ${known})`);
  }
  return dialect;
}

export async function readDump(label: string, filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new MissingInputError(label, filePath, err);
  }
}

function extractPipeline(
  text: string,
  dialect: HeaderDialect,
  store: ArtifactStore,
  ctx: RunContext,
  label: string,
): PassRecord[] {
  const headers = scanHeaders(text, dialect);
  ctx.logger.info(`Found ${headers.length} pipeline ${label} pass headers`);
  const passes = extract(text, headers, store, { logger: ctx.logger });
  ctx.logger.debug(`Extracted ${passes.length} pipeline ${label} passes`);
  return passes;
}
