import type Database from 'better-sqlite3';
import { isMetricKey, type MetricKey } from '../pipeline/metrics.js';
import type { AggregateResult } from '../pipeline/aggregate.js';
import { openDatabase } from './schema.js';

export type RunStatus = 'running' | 'success' | 'failed';

export interface JobRun {
  id: number;
  input_path: string;
  output_path: string;
  status: RunStatus;
  records_read: number;
  records_classified: number;
  error: string | null;
  started_at: string;
  completed_at: string | null;
}

export interface RunCounts {
  recordsRead: number;
  recordsClassified: number;
}

interface ResultRow {
  metric: string;
  average: number;
}

// History of job runs and the averages they produced
export class RunStore {
  constructor(private readonly db: Database.Database) {}

  static open(filePath: string): RunStore {
    return new RunStore(openDatabase(filePath));
  }

  logRunStart(inputPath: string, outputPath: string): number {
    const result = this.db.prepare(`
      INSERT INTO job_runs (input_path, output_path, status, started_at) VALUES (?, ?, 'running', datetime('now'))
    `).run(inputPath, outputPath);
    return Number(result.lastInsertRowid);
  }

  logRunEnd(id: number, status: Exclude<RunStatus, 'running'>, counts: RunCounts, error?: string): void {
    this.db.prepare(`
      UPDATE job_runs SET status = ?, records_read = ?, records_classified = ?, error = ?, completed_at = datetime('now')
      WHERE id = ?
    `).run(status, counts.recordsRead, counts.recordsClassified, error ?? null, id);
  }

  saveResults(runId: number, results: readonly AggregateResult[]): void {
    const insert = this.db.prepare(`
      INSERT INTO job_results (run_id, metric, average) VALUES (?, ?, ?)
      ON CONFLICT(run_id, metric) DO UPDATE SET average = excluded.average
    `);
    const transaction = this.db.transaction((items: readonly AggregateResult[]) => {
      for (const item of items) {
        insert.run(runId, item.key, item.average);
      }
    });
    transaction(results);
  }

  getRecentRuns(limit = 20): JobRun[] {
    return this.db.prepare<[number], JobRun>(`
      SELECT * FROM job_runs ORDER BY started_at DESC, id DESC LIMIT ?
    `).all(limit);
  }

  getRun(id: number): JobRun | null {
    return this.db.prepare<[number], JobRun>('SELECT * FROM job_runs WHERE id = ?').get(id) ?? null;
  }

  getRunResults(runId: number): AggregateResult[] {
    const rows = this.db.prepare<[number], ResultRow>(`
      SELECT metric, average FROM job_results WHERE run_id = ? ORDER BY metric
    `).all(runId);

    return rows
      .filter((row): row is { metric: MetricKey; average: number } => isMetricKey(row.metric))
      .map(row => ({ key: row.metric, average: row.average }));
  }

  close(): void {
    this.db.close();
  }
}
