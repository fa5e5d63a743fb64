import { EventBus } from './event_bus.js';
import { InvalidJobError, ValidationError, errorMessage } from './errors.js';
import { ProcessRunner, type JobRunner, type RunnerFactory } from './runner.js';
import {
  commandLine,
  formatExitCode,
  makeResult,
  type Job,
  type JobResult,
  type JobSpec,
  type OutputLine,
  type SchedulerEvents,
} from './types.js';

export const MIN_PARALLEL = 1;
export const MAX_PARALLEL = 12;
export const DEFAULT_PARALLEL = 2;

export interface SchedulerOptions {
  maxParallel?: number;
  /** When false, jobs wait in the queue until `start()`. */
  autoStart?: boolean;
  /** When false, process output is drained but neither emitted nor logged. */
  emitOutput?: boolean;
  runnerFactory?: RunnerFactory;
  clock?: () => Date;
}

export interface QueueSnapshot {
  pending: string[];
  running: string[];
  completed: string[];
}

export function validateMaxParallel(n: number): number {
  if (!Number.isInteger(n) || n < MIN_PARALLEL || n > MAX_PARALLEL) {
    throw new ValidationError(`maxParallel must be an integer between ${MIN_PARALLEL} and ${MAX_PARALLEL} (got ${n})`);
  }
  return n;
}

function validateSpec(spec: JobSpec, index: number) {
  if (typeof spec.command !== 'string' || spec.command.trim() === '') {
    throw new InvalidJobError(index, 'command is missing');
  }
  if (!Array.isArray(spec.args) || !spec.args.every((a) => typeof a === 'string')) {
    throw new InvalidJobError(index, 'args must be a list of strings');
  }
  if (typeof spec.displayName !== 'string' || spec.displayName.trim() === '') {
    throw new InvalidJobError(index, 'displayName is missing');
  }
  if (spec.workingDirectory !== undefined && (typeof spec.workingDirectory !== 'string' || spec.workingDirectory === '')) {
    throw new InvalidJobError(index, 'workingDirectory must be a non-empty path');
  }
}

/**
 * Bounded-concurrency supervisor: one external process per job, at most
 * `maxParallel` at once, admitted in submission order.
 *
 * Every submitted job gets exactly one `jobFinished`. Jobs that never ran
 * (launch failure, cancelled while pending) get it without a `jobStarted`.
 * `queueEmpty` fires once each time the queue drains after a submission;
 * batches submitted while earlier ones are in flight drain together.
 */
export class ParallelManager {
  readonly events = new EventBus<SchedulerEvents>('scheduler');

  private _maxParallel: number;
  private readonly emitOutput: boolean;
  private readonly runnerFactory: RunnerFactory;
  private readonly clock: () => Date;

  private readonly pending: Job[] = [];
  private readonly running = new Map<string, JobRunner>();
  private readonly completed = new Map<string, JobResult>();

  private started: boolean;
  private cycleOpen = false;
  private cycleResults: JobResult[] = [];
  private pumping = false;
  private repump = false;
  private jobSeq = 0;
  private batchSeq = 0;

  constructor(options: SchedulerOptions = {}) {
    this._maxParallel = validateMaxParallel(options.maxParallel ?? DEFAULT_PARALLEL);
    this.started = options.autoStart ?? true;
    this.emitOutput = options.emitOutput ?? true;
    this.clock = options.clock ?? (() => new Date());
    this.runnerFactory = options.runnerFactory ?? ((job) => new ProcessRunner(job, { clock: this.clock }));
  }

  get maxParallel() {
    return this._maxParallel;
  }

  get pendingCount() {
    return this.pending.length;
  }

  get runningCount() {
    return this.running.size;
  }

  get completedCount() {
    return this.completed.size;
  }

  get isIdle() {
    return this.pending.length === 0 && this.running.size === 0;
  }

  /** Running jobs are never pre-empted when the cap shrinks. */
  configure(maxParallel: number) {
    this._maxParallel = validateMaxParallel(maxParallel);
    this.pump();
  }

  submit(specs: readonly JobSpec[]): Job[] {
    specs.forEach(validateSpec);

    const batchId = ++this.batchSeq;
    const jobs = specs.map(
      (spec): Job =>
        Object.freeze({
          id: `job-${++this.jobSeq}`,
          batchId,
          displayName: spec.displayName,
          command: spec.command,
          args: Object.freeze([...spec.args]),
          workingDirectory: spec.workingDirectory,
          logSink: spec.logSink,
        })
    );

    this.pending.push(...jobs);
    this.cycleOpen = true;
    this.pump();
    return jobs;
  }

  start() {
    if (this.started) return;
    this.started = true;
    this.pump();
  }

  /**
   * Drop everything pending and ask every running process to die.
   * Returns at once; killed results arrive as their exits are observed.
   */
  cancelAll() {
    const dropped = this.pending.splice(0, this.pending.length);
    for (const job of dropped) {
      this.complete(
        job,
        makeResult(job, {
          exitCode: 'cancelled',
          signal: null,
          killed: false,
          startedAt: null,
          finishedAt: this.clock(),
          error: 'Cancelled before start',
        })
      );
    }
    for (const runner of this.running.values()) {
      runner.terminate();
    }
    this.pump();
  }

  getResult(jobId: string): JobResult | undefined {
    return this.completed.get(jobId);
  }

  results(): JobResult[] {
    return [...this.completed.values()];
  }

  clearCompleted() {
    this.completed.clear();
  }

  snapshot(): QueueSnapshot {
    return {
      pending: this.pending.map((j) => j.id),
      running: [...this.running.keys()],
      completed: [...this.completed.keys()],
    };
  }

  private pump() {
    if (this.pumping) {
      this.repump = true;
      return;
    }
    this.pumping = true;
    try {
      do {
        this.repump = false;
        this.admitAvailable();
        this.checkDrained();
      } while (this.repump);
    } finally {
      this.pumping = false;
    }
  }

  private admitAvailable() {
    while (this.started && this.running.size < this._maxParallel) {
      const job = this.pending.shift();
      if (!job) return;
      this.admit(job);
    }
  }

  private tryLaunch(job: Job): { ok: true; runner: JobRunner } | { ok: false; result: JobResult } {
    try {
      const runner = this.runnerFactory(job);
      const outcome = runner.launch();
      return outcome.status === 'running' ? { ok: true, runner } : { ok: false, result: outcome.result };
    } catch (err) {
      const result = makeResult(job, {
        exitCode: 'launch-failure',
        signal: null,
        killed: false,
        startedAt: null,
        finishedAt: this.clock(),
        error: errorMessage(err),
      });
      return { ok: false, result };
    }
  }

  private admit(job: Job) {
    const launched = this.tryLaunch(job);
    if (!launched.ok) {
      this.complete(job, launched.result);
      return;
    }

    const { runner } = launched;
    this.running.set(job.id, runner);
    runner.events.on('line', (line) => this.onLine(job, line));
    runner.events.once('exit', ({ result }) => this.onRunnerExit(job, result));
    this.writeLog(job, `== started: ${commandLine(job)}`);
    this.events.emit('jobStarted', { job });
  }

  private onLine(job: Job, line: OutputLine) {
    if (!this.emitOutput || !this.running.has(job.id)) return;
    this.writeLog(job, line.stream === 'stderr' ? `[stderr] ${line.text}` : line.text);
    this.events.emit('outputLine', { ...line, jobId: job.id, displayName: job.displayName });
  }

  private onRunnerExit(job: Job, result: JobResult) {
    if (!this.running.delete(job.id)) return;
    this.complete(job, result);
    this.pump();
  }

  private complete(job: Job, result: JobResult) {
    this.completed.set(job.id, result);
    this.cycleResults.push(result);
    const detail = result.error ? ` (${result.error})` : '';
    this.writeLog(job, `== finished: exit=${formatExitCode(result.exitCode)}${detail}`);
    this.closeLog(job);
    this.events.emit('jobFinished', { job, result });
  }

  private checkDrained() {
    if (!this.cycleOpen || !this.isIdle) return;
    const results = this.cycleResults;
    this.cycleOpen = false;
    this.cycleResults = [];
    this.events.emit('queueEmpty', { results });
  }

  private writeLog(job: Job, line: string) {
    if (!job.logSink) return;
    try {
      job.logSink.write(line);
    } catch (err) {
      console.error(`[scheduler] log write failed for ${job.displayName}: ${errorMessage(err)}`);
    }
  }

  private closeLog(job: Job) {
    if (!job.logSink) return;
    try {
      job.logSink.close();
    } catch (err) {
      console.error(`[scheduler] log close failed for ${job.displayName}: ${errorMessage(err)}`);
    }
  }
}
