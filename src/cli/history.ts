import { ValidationError } from '../core/errors.js';
import { listRuns, summary, type RunRow } from '../db/repo.js';

// SQLite treats a negative LIMIT as no limit at all
export function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ValidationError(`--limit must be a positive integer (got ${value})`);
  }
  return n;
}

export function formatRunRow(r: RunRow): string {
  const status = r.succeeded ? 'ok' : r.exit_code;
  return `${r.finished_at}  ${r.run_id}  ${r.display_name.padEnd(24)}  ${status}${r.error && !r.succeeded ? `  ${r.error}` : ''}`;
}

export function printHistory(limit: number) {
  const rows = listRuns(limit);
  if (rows.length === 0) {
    console.log('No recorded jobs.');
    return;
  }
  for (const r of rows) console.log(formatRunRow(r));
  const s = summary();
  console.log(`\n${s.total} job(s) in ${s.runs} run(s): ${s.succeeded} succeeded, ${s.failed} failed`);
}
