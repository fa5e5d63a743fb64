import { getDB } from './db.js';
import { commandLine, formatExitCode, type Job, type JobResult } from '../core/types.js';

export interface RunRow {
  run_id: string;
  job_id: string;
  display_name: string;
  command: string;
  exit_code: string;
  killed: number;
  succeeded: number;
  started_at: string | null;
  finished_at: string;
  error: string | null;
  log_path: string | null;
}

interface ConfigRow {
  key: string;
  value: string;
}

/**
 * All config rows as stored (text values)
 */
export function getConfigRows(): Record<string, string> {
  const rows = getDB().prepare('SELECT key, value FROM config ORDER BY key').all() as ConfigRow[];
  const res: Record<string, string> = {};
  for (const row of rows) res[row.key] = row.value;
  return res;
}

/**
 * Set or update a config key/value pair
 */
export function setConfig(key: string, value: string) {
  getDB().prepare(`
    INSERT INTO config(key, value)
    VALUES (?, ?)
    ON CONFLICT(key)
    DO UPDATE SET value = excluded.value
  `).run(key, value);
}

/**
 * Record the terminal result of one job of a run
 */
export function recordResult(runId: string, job: Job, result: JobResult, logPath: string | null = null) {
  getDB().prepare(`
    INSERT OR REPLACE INTO runs(
      run_id, job_id, display_name, command, exit_code, killed,
      succeeded, started_at, finished_at, error, log_path
    ) VALUES (
      @run_id, @job_id, @display_name, @command, @exit_code, @killed,
      @succeeded, @started_at, @finished_at, @error, @log_path
    )
  `).run({
    run_id: runId,
    job_id: job.id,
    display_name: result.displayName,
    command: commandLine(job),
    exit_code: formatExitCode(result.exitCode),
    killed: result.killed ? 1 : 0,
    succeeded: result.succeeded ? 1 : 0,
    started_at: result.startedAt?.toISOString() ?? null,
    finished_at: result.finishedAt.toISOString(),
    error: result.error,
    log_path: logPath,
  } satisfies RunRow);
}

/**
 * Most recent results first
 */
export function listRuns(limit = 50): RunRow[] {
  return getDB()
    .prepare('SELECT * FROM runs ORDER BY finished_at DESC, rowid DESC LIMIT ?')
    .all(limit) as RunRow[];
}

/**
 * All results of one run, in completion order
 */
export function listRunsByBatch(runId: string): RunRow[] {
  return getDB()
    .prepare('SELECT * FROM runs WHERE run_id=? ORDER BY finished_at, rowid')
    .all(runId) as RunRow[];
}

/**
 * Summary of recorded outcomes
 */
export function summary() {
  const row = getDB().prepare(`
    SELECT
      COUNT(*) AS total,
      COALESCE(SUM(succeeded), 0) AS succeeded,
      COUNT(DISTINCT run_id) AS runs,
      MAX(finished_at) AS last_finished
    FROM runs
  `).get() as { total: number; succeeded: number; runs: number; last_finished: string | null };

  return {
    total: row.total,
    succeeded: row.succeeded,
    failed: row.total - row.succeeded,
    runs: row.runs,
    lastFinished: row.last_finished,
  };
}
