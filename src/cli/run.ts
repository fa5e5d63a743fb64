import path from 'node:path';
import { prepareJobs } from '../batch/prepare.js';
import { scriptItemFromPath, type ScriptItem } from '../batch/script.js';
import { ValidationError } from '../core/errors.js';
import { FileLogSink } from '../core/log_sink.js';
import { ParallelManager, validateMaxParallel } from '../core/scheduler.js';
import type { JobResult, JobSpec } from '../core/types.js';
import { recordResult } from '../db/repo.js';
import { loadSettings } from './config_cmd.js';
import { attachReporter, formatSummary } from './reporter.js';

export interface RunOptions {
  script: string[];
  invoke?: string[];
  parallel?: string;
  output?: string;
  accore?: string;
  log: boolean;
}

/**
 * Submit one batch and resolve with its results once the queue drains.
 */
export function runBatch(manager: ParallelManager, specs: readonly JobSpec[]): Promise<JobResult[]> {
  return new Promise((resolve, reject) => {
    const off = manager.events.once('queueEmpty', ({ results }) => resolve(results));
    try {
      manager.submit(specs);
    } catch (err) {
      off();
      reject(err);
    }
  });
}

/** `--invoke file.lsp=CMD` pairs keyed by script basename. */
export function parseInvokes(pairs: readonly string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0 || eq === pair.length - 1) {
      throw new ValidationError(`Invalid --invoke "${pair}"; expected <script.lsp>=<command>`);
    }
    map.set(path.basename(pair.slice(0, eq)).toLowerCase(), pair.slice(eq + 1));
  }
  return map;
}

export function buildItems(scripts: readonly string[], invokes: readonly string[] = []): ScriptItem[] {
  const byName = parseInvokes(invokes);
  return scripts.map((s) => scriptItemFromPath(path.resolve(s), byName.get(path.basename(s).toLowerCase())));
}

export async function runCommand(drawings: string[], opts: RunOptions): Promise<number> {
  const settings = { ...loadSettings() };
  if (opts.parallel !== undefined) settings.max_parallel = validateMaxParallel(Number(opts.parallel));
  if (opts.output !== undefined) settings.output_dir = opts.output;
  if (opts.accore !== undefined) settings.accore_path = opts.accore;
  if (!opts.log) settings.enable_logging = false;

  const prepared = prepareJobs(drawings, buildItems(opts.script, opts.invoke), settings);

  const manager = new ParallelManager({
    maxParallel: settings.max_parallel,
    emitOutput: settings.enable_logging,
  });
  const runId = `run-${new Date().toISOString().replace(/[-:.]/g, '')}`;
  console.log(`Running ${prepared.length} job(s) with up to ${settings.max_parallel} in parallel (${runId})…`);

  const detach = attachReporter(manager, { total: prepared.length });
  manager.events.on('jobFinished', ({ job, result }) => {
    recordResult(runId, job, result, job.logSink instanceof FileLogSink ? job.logSink.path : null);
  });

  const onSigint = () => {
    console.warn('== Aborted by user ==');
    manager.cancelAll();
  };
  process.once('SIGINT', onSigint);

  try {
    const results = await runBatch(
      manager,
      prepared.map((p) => p.spec)
    );
    console.log(formatSummary(results));
    return results.every((r) => r.succeeded) ? 0 : 1;
  } finally {
    process.off('SIGINT', onSigint);
    detach();
  }
}
