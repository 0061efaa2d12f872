/**
 * Run journal.
 *
 * Persists every pipeline run and its stage entries in a SQLite database
 * so a failed run can be resumed from the stage that halted it. Schema
 * changes are ordered migrations tracked via `PRAGMA user_version`.
 */

import Database from 'better-sqlite3';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import { isErrorKind } from '../types/errors.js';
import type { HaltInfo, PipelineResult, RunRecorder } from './pipeline/types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Migration {
  version: number;
  up(db: Database.Database): void;
}

export interface RunJournalOptions {
  /** Database file. Parent directories are created. */
  path: string;
  /** Use an in-memory database for testing. */
  useMemory?: boolean;
  now?: () => Date;
}

export interface JournalEntry {
  position: number;
  stage: string;
  outcome: 'success' | 'failed';
  attempts: number;
  durationMs: number;
  errorKind?: string;
  errorMessage?: string;
}

export interface JournalRun {
  id: number;
  pipeline: string;
  status: 'succeeded' | 'failed';
  startedAt: string;
  finishedAt: string;
  startIndex: number;
  totalAttempts: number;
  haltedAt?: HaltInfo;
  entries: JournalEntry[];
}

interface RunRow {
  id: number;
  pipeline: string;
  status: string;
  started_at: string;
  finished_at: string;
  start_index: number;
  total_attempts: number;
  halted_stage: string | null;
  halted_index: number | null;
  error_kind: string | null;
  error_message: string | null;
}

interface EntryRow {
  position: number;
  stage: string;
  outcome: string;
  attempts: number;
  duration_ms: number;
  error_kind: string | null;
  error_message: string | null;
}

// ---------------------------------------------------------------------------
// Migrations
// ---------------------------------------------------------------------------

export const JOURNAL_MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    up(db) {
      db.exec(`
        CREATE TABLE runs (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          pipeline TEXT NOT NULL,
          status TEXT NOT NULL,
          started_at TEXT NOT NULL,
          finished_at TEXT NOT NULL,
          start_index INTEGER NOT NULL,
          total_attempts INTEGER NOT NULL,
          halted_stage TEXT,
          halted_index INTEGER,
          error_kind TEXT,
          error_message TEXT
        );
        CREATE INDEX idx_runs_pipeline ON runs (pipeline, id);
        CREATE TABLE stage_runs (
          run_id INTEGER NOT NULL REFERENCES runs (id) ON DELETE CASCADE,
          position INTEGER NOT NULL,
          stage TEXT NOT NULL,
          outcome TEXT NOT NULL,
          attempts INTEGER NOT NULL,
          duration_ms INTEGER NOT NULL,
          error_kind TEXT,
          error_message TEXT,
          PRIMARY KEY (run_id, position)
        );
      `);
    },
  },
];

// ---------------------------------------------------------------------------
// RunJournal
// ---------------------------------------------------------------------------

export class RunJournal implements RunRecorder {
  private readonly db: Database.Database;
  private readonly now: () => Date;
  private closed = false;

  constructor(options: RunJournalOptions) {
    this.now = options.now ?? (() => new Date());
    if (options.useMemory) {
      this.db = new Database(':memory:');
    } else {
      mkdirSync(dirname(options.path), { recursive: true });
      this.db = new Database(options.path);
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    this.applyMigrations();
  }

  /** Schema version currently applied. */
  get schemaVersion(): number {
    const version: unknown = this.db.pragma('user_version', { simple: true });
    return typeof version === 'number' ? version : 0;
  }

  /** Store a finished run. Returns its id. */
  recordRun(result: PipelineResult, startedAt: Date): number {
    const insertRun = this.db.prepare(`
      INSERT INTO runs (pipeline, status, started_at, finished_at, start_index,
                        total_attempts, halted_stage, halted_index, error_kind, error_message)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertEntry = this.db.prepare(`
      INSERT INTO stage_runs (run_id, position, stage, outcome, attempts, duration_ms,
                              error_kind, error_message)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const write = this.db.transaction((): number => {
      const info = insertRun.run(
        result.pipeline,
        result.status,
        startedAt.toISOString(),
        this.now().toISOString(),
        result.startIndex,
        result.totalAttempts,
        result.haltedAt?.stage ?? null,
        result.haltedAt?.index ?? null,
        result.haltedAt?.kind ?? null,
        result.haltedAt?.message ?? null,
      );
      const runId = Number(info.lastInsertRowid);
      result.entries.forEach((entry, i) => {
        insertEntry.run(
          runId,
          result.startIndex + i,
          entry.stage,
          entry.outcome,
          entry.attempts,
          entry.durationMs,
          entry.outcome === 'failed' ? entry.error.kind : null,
          entry.outcome === 'failed' ? entry.error.message : null,
        );
      });
      return runId;
    });

    return write();
  }

  /** Most recent run of a pipeline, or null if it never ran. */
  lastRun(pipeline: string): JournalRun | null {
    const row = this.db
      .prepare<[string], RunRow>('SELECT * FROM runs WHERE pipeline = ? ORDER BY id DESC LIMIT 1')
      .get(pipeline);
    if (!row) return null;

    const entries = this.db
      .prepare<[number], EntryRow>(
        'SELECT * FROM stage_runs WHERE run_id = ? ORDER BY position ASC',
      )
      .all(row.id)
      .map(toJournalEntry);

    const run: JournalRun = {
      id: row.id,
      pipeline: row.pipeline,
      status: row.status === 'succeeded' ? 'succeeded' : 'failed',
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      startIndex: row.start_index,
      totalAttempts: row.total_attempts,
      entries,
    };
    if (row.halted_stage !== null && row.halted_index !== null && isErrorKind(row.error_kind)) {
      run.haltedAt = {
        stage: row.halted_stage,
        index: row.halted_index,
        kind: row.error_kind,
        message: row.error_message ?? '',
      };
    }
    return run;
  }

  /**
   * Name of the stage that halted the most recent run, or null when the
   * most recent run succeeded or there is none.
   */
  resumePoint(pipeline: string): string | null {
    const run = this.lastRun(pipeline);
    if (!run || run.status !== 'failed') return null;
    return run.haltedAt?.stage ?? null;
  }

  /** Close the database. Safe to call multiple times. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private applyMigrations(): void {
    const current = this.schemaVersion;
    for (const migration of [...JOURNAL_MIGRATIONS].sort((a, b) => a.version - b.version)) {
      if (migration.version <= current) continue;
      migration.up(this.db);
      this.db.pragma(`user_version = ${migration.version}`);
    }
  }
}

function toJournalEntry(row: EntryRow): JournalEntry {
  const entry: JournalEntry = {
    position: row.position,
    stage: row.stage,
    outcome: row.outcome === 'success' ? 'success' : 'failed',
    attempts: row.attempts,
    durationMs: row.duration_ms,
  };
  if (row.error_kind !== null) entry.errorKind = row.error_kind;
  if (row.error_message !== null) entry.errorMessage = row.error_message;
  return entry;
}
