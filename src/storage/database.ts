import Database from 'better-sqlite3';
import type { ArtifactHandle, PipelineSide } from '../model/pass.js';
import type { ArtifactStore } from './artifact-store.js';
import { SCHEMA_DDL } from './schema.js';
import { StorageFaultError } from '../errors.js';
import { contentHash } from '../utils/hash.js';

export interface RunRow {
  id: string;
  startedAt: string;
  pipelineA: string;
  pipelineB: string;
  passesA: number;
  passesB: number;
  matched: number;
  unmatched: number;
  divergenceFound: boolean;
  divergenceIndex?: number;
  divergentA?: string;
  divergentB?: string;
}

interface RunRecordRow {
  id: string;
  started_at: string;
  pipeline_a: string;
  pipeline_b: string;
  passes_a: number;
  passes_b: number;
  matched: number;
  unmatched: number;
  divergence_found: number;
  divergence_index: number | null;
  divergent_a: string | null;
  divergent_b: string | null;
}

export interface ArtifactRow {
  handle: string;
  name: string;
  contentHash: string;
}

export class RunDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.init();
  }

  private init(): void {
    this.db.exec(SCHEMA_DDL);
  }

  setMetadata(key: string, value: string): void {
    this.db.prepare(
      'INSERT OR REPLACE INTO metadata (key, value) VALUES (?, ?)'
    ).run(key, value);
  }

  getMetadata(key: string): string | undefined {
    const row = this.db
      .prepare<[string], { value: string }>('SELECT value FROM metadata WHERE key = ?')
      .get(key);
    return row?.value;
  }

  /** Storage capability for one pipeline of one run. */
  artifactStore(runId: string, pipeline: PipelineSide): ArtifactStore {
    return new SqliteArtifactStore(this, runId, pipeline);
  }

  insertArtifact(runId: string, pipeline: PipelineSide, name: string, content: string): ArtifactHandle {
    const handle = `${runId}/${pipeline}/${name}`;
    this.db.prepare(`
      INSERT OR REPLACE INTO artifacts (handle, run_id, pipeline, name, content, content_hash)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(handle, runId, pipeline, name, content, contentHash(content));
    return handle;
  }

  getArtifact(handle: ArtifactHandle): string | undefined {
    const row = this.db
      .prepare<[string], { content: string }>('SELECT content FROM artifacts WHERE handle = ?')
      .get(handle);
    return row?.content;
  }

  listArtifacts(runId: string, pipeline: PipelineSide): ArtifactRow[] {
    const rows = this.db
      .prepare<[string, string], { handle: string; name: string; content_hash: string }>(
        'SELECT handle, name, content_hash FROM artifacts WHERE run_id = ? AND pipeline = ? ORDER BY name',
      )
      .all(runId, pipeline);
    return rows.map(r => ({ handle: r.handle, name: r.name, contentHash: r.content_hash }));
  }

  insertRun(run: RunRow): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO runs (id, started_at, pipeline_a, pipeline_b, passes_a, passes_b, matched, unmatched, divergence_found, divergence_index, divergent_a, divergent_b)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      run.id, run.startedAt, run.pipelineA, run.pipelineB, run.passesA, run.passesB,
      run.matched, run.unmatched, run.divergenceFound ? 1 : 0,
      run.divergenceIndex ?? null, run.divergentA ?? null, run.divergentB ?? null,
    );
  }

  getRuns(limit?: number): RunRow[] {
    let sql = 'SELECT * FROM runs ORDER BY started_at DESC';
    const params: number[] = [];
    if (limit) {
      sql += ' LIMIT ?';
      params.push(limit);
    }

    const rows = this.db.prepare<number[], RunRecordRow>(sql).all(...params);
    return rows.map(row => ({
      id: row.id,
      startedAt: row.started_at,
      pipelineA: row.pipeline_a,
      pipelineB: row.pipeline_b,
      passesA: row.passes_a,
      passesB: row.passes_b,
      matched: row.matched,
      unmatched: row.unmatched,
      divergenceFound: row.divergence_found === 1,
      divergenceIndex: row.divergence_index ?? undefined,
      divergentA: row.divergent_a ?? undefined,
      divergentB: row.divergent_b ?? undefined,
    }));
  }

  close(): void {
    this.db.close();
  }
}

export class SqliteArtifactStore implements ArtifactStore {
  constructor(
    private readonly database: RunDatabase,
    private readonly runId: string,
    private readonly pipeline: PipelineSide,
  ) {}

  write(name: string, content: string): ArtifactHandle {
    try {
      return this.database.insertArtifact(this.runId, this.pipeline, name, content);
    } catch (err) {
      throw new StorageFaultError(name, err);
    }
  }

  read(handle: ArtifactHandle): string {
    const content = this.database.getArtifact(handle);
    if (content === undefined) {
      throw new StorageFaultError(handle, new Error('artifact not found'));
    }
    return content;
  }
}
