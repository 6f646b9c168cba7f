import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

export const schema = `
-- Job runs
CREATE TABLE IF NOT EXISTS job_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  input_path TEXT NOT NULL,
  output_path TEXT NOT NULL,
  status TEXT NOT NULL,
  records_read INTEGER DEFAULT 0,
  records_classified INTEGER DEFAULT 0,
  error TEXT,
  started_at TEXT NOT NULL,
  completed_at TEXT
);

-- Per-metric averages of a successful run
CREATE TABLE IF NOT EXISTS job_results (
  run_id INTEGER NOT NULL REFERENCES job_runs(id) ON DELETE CASCADE,
  metric TEXT NOT NULL,
  average REAL NOT NULL,
  PRIMARY KEY (run_id, metric)
);

CREATE INDEX IF NOT EXISTS idx_job_runs_started ON job_runs(started_at);
CREATE INDEX IF NOT EXISTS idx_job_runs_status ON job_runs(status);
`;

export function openDatabase(filePath: string): Database.Database {
  if (filePath !== ':memory:') {
    // Ensure data directory exists
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  const db = new Database(filePath);
  // Enable WAL mode for better concurrent access
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(schema);
  return db;
}

export function defaultDatabasePath(dataDir: string): string {
  return path.join(dataDir, 'runs.db');
}
