import type { ParallelManager } from '../core/scheduler.js';
import { formatExitCode, type JobResult } from '../core/types.js';

export interface ReporterOptions {
  total: number;
  out?: (line: string) => void;
  err?: (line: string) => void;
}

function elapsed(result: JobResult): string {
  if (!result.startedAt) return '';
  const ms = result.finishedAt.getTime() - result.startedAt.getTime();
  return ` in ${ms}ms`;
}

export function formatResultLine(result: JobResult): string {
  const tag = `[${result.displayName}]`;
  if (result.succeeded) return `${tag} ✅ completed successfully${elapsed(result)}`;
  switch (result.exitCode) {
    case 'launch-failure':
      return `${tag} ❌ could not be launched: ${result.error ?? 'unknown error'}`;
    case 'cancelled':
      return `${tag} ⏹ cancelled before start`;
    case 'killed':
      return `${tag} ⏹ killed${elapsed(result)}`;
    case 'crashed':
      return `${tag} ❌ crashed${result.signal ? ` (${result.signal})` : ''}${elapsed(result)}`;
    default:
      return `${tag} ❌ failed with exit=${formatExitCode(result.exitCode)}${elapsed(result)}`;
  }
}

export function formatSummary(results: readonly JobResult[]): string {
  const ok = results.filter((r) => r.succeeded).length;
  return `All jobs finished. (${ok}/${results.length} succeeded)`;
}

/**
 * Console consumer of scheduler events. Returns a detach function.
 */
export function attachReporter(manager: ParallelManager, opts: ReporterOptions): () => void {
  const out = opts.out ?? ((line: string) => console.log(line));
  const err = opts.err ?? ((line: string) => console.error(line));
  let done = 0;

  const offs = [
    manager.events.on('jobStarted', ({ job }) => {
      out(`[${job.displayName}] ▶ started (${job.id})`);
    }),
    manager.events.on('outputLine', (line) => {
      const text = `[${line.displayName}] ${line.text}${line.lossy ? ' ⚠ undecodable bytes replaced' : ''}`;
      if (line.stream === 'stderr') err(text);
      else out(text);
    }),
    manager.events.on('jobFinished', ({ result }) => {
      done += 1;
      const line = formatResultLine(result);
      if (result.succeeded) out(line);
      else err(line);
      out(`Completed ${done}/${opts.total}.`);
    }),
  ];

  return () => offs.forEach((off) => off());
}
