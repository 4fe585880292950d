import Database from 'better-sqlite3';

let _db: Database.Database | null = null;

export function openDb(dbPath: string): Database.Database {
  if (_db) return _db;
  _db = new Database(dbPath);
  _db.pragma('journal_mode = WAL');
  _db.pragma('foreign_keys = ON');
  applyInlineSchema(_db);
  return _db;
}

export function applyInlineSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS runs (
      id TEXT PRIMARY KEY,
      pipeline_id TEXT NOT NULL,
      commit_hash TEXT NOT NULL,
      branch TEXT NOT NULL,
      build_number INTEGER NOT NULL,
      image_ref TEXT NOT NULL,
      status TEXT NOT NULL CHECK (status IN ('running','succeeded','failed')),
      failed_stage TEXT,
      failure_reason TEXT,
      started_at TEXT NOT NULL,
      ended_at TEXT,
      dry_run INTEGER NOT NULL CHECK (dry_run IN (0,1))
    );
    CREATE INDEX IF NOT EXISTS idx_runs_build ON runs(commit_hash, build_number);
    CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);

    CREATE TABLE IF NOT EXISTS stage_results (
      run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
      position INTEGER NOT NULL,
      stage TEXT NOT NULL,
      kind TEXT NOT NULL CHECK (kind IN ('blocking','advisory')),
      outcome TEXT NOT NULL CHECK (outcome IN ('succeeded','failed','advisory','skipped')),
      reason TEXT,
      error_code TEXT,
      findings_json TEXT NOT NULL DEFAULT '[]',
      artifacts_json TEXT NOT NULL DEFAULT '[]',
      started_at TEXT,
      ended_at TEXT,
      PRIMARY KEY (run_id, position)
    );
  `);
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

/** For testing only – closes and forgets the cached handle. */
export function _resetDb(): void {
  closeDb();
}
