import type { Readable } from 'node:stream';
import { execa } from 'execa';
import { EventBus } from './event_bus.js';
import { checkWorkingDirectory, resolveExecutable } from './executable.js';
import { errorMessage } from './errors.js';
import { LineSplitter } from './line_splitter.js';
import {
  isTerminal,
  makeResult,
  type Job,
  type JobResult,
  type LaunchOutcome,
  type OutputStream,
  type RunnerEvents,
  type RunnerState,
  type TerminalState,
} from './types.js';

/** What the scheduler needs from a runner; `ProcessRunner` is the real one. */
export interface JobRunner {
  readonly job: Job;
  readonly state: RunnerState;
  readonly events: EventBus<RunnerEvents>;
  launch(): LaunchOutcome;
  terminate(): void;
}

export type RunnerFactory = (job: Job) => JobRunner;

export interface RunnerOptions {
  clock?: () => Date;
  env?: NodeJS.ProcessEnv;
}

const SPAWN_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EPERM', 'ENOTDIR', 'EISDIR']);

/** Exit status of a spawned process, as far as the runner cares. */
export interface ProcessOutcome {
  exitCode?: number;
  signal?: string;
  code?: string;
  failed: boolean;
  shortMessage?: string;
}

function toOutcome(result: { exitCode?: number; signal?: string; failed: boolean }): ProcessOutcome {
  return {
    exitCode: result.exitCode,
    signal: result.signal,
    failed: result.failed,
    code: 'code' in result && typeof result.code === 'string' ? result.code : undefined,
    shortMessage: 'shortMessage' in result && typeof result.shortMessage === 'string' ? result.shortMessage : undefined,
  };
}

export type ExitFields = Pick<JobResult, 'exitCode' | 'signal' | 'killed' | 'error'>;

/**
 * Map an observed process exit onto a terminal state and result fields.
 * A terminate request only counts when the process actually died by a
 * signal; one that exited on its own first keeps its real exit code.
 */
export function classifyExit(
  outcome: ProcessOutcome,
  terminateRequested: boolean
): { state: TerminalState; fields: ExitFields } {
  const signal = outcome.signal ?? null;

  if (signal !== null) {
    return terminateRequested
      ? { state: 'killed', fields: { exitCode: 'killed', signal, killed: true, error: 'Terminated on request' } }
      : { state: 'crashed', fields: { exitCode: 'crashed', signal, killed: true, error: `Killed by ${signal}` } };
  }
  if (typeof outcome.exitCode === 'number') {
    return {
      state: 'finished',
      fields: {
        exitCode: outcome.exitCode,
        signal: null,
        killed: false,
        error: outcome.exitCode === 0 ? null : `Exited with code ${outcome.exitCode}`,
      },
    };
  }
  if (outcome.code !== undefined && SPAWN_ERROR_CODES.has(outcome.code)) {
    return {
      state: 'finished',
      fields: { exitCode: 'launch-failure', signal: null, killed: false, error: outcome.shortMessage ?? outcome.code },
    };
  }
  return {
    state: 'crashed',
    fields: {
      exitCode: 'crashed',
      signal: null,
      killed: false,
      error: outcome.shortMessage ?? 'Process failed without an exit code',
    },
  };
}

/**
 * Owns one external process for one job: launch, stream capture,
 * completion and forced termination.
 *
 * not-started → launching → running → finished | crashed | killed,
 * with launching → finished when the executable cannot be launched.
 */
export class ProcessRunner implements JobRunner {
  readonly events = new EventBus<RunnerEvents>('runner');
  private _state: RunnerState = 'not-started';
  private startedAt: Date | null = null;
  private terminateRequested = false;
  private kill: (() => boolean) | null = null;
  private readonly clock: () => Date;
  private readonly env: NodeJS.ProcessEnv;

  constructor(readonly job: Job, options: RunnerOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.env = options.env ?? process.env;
  }

  get state(): RunnerState {
    return this._state;
  }

  launch(): LaunchOutcome {
    if (this._state !== 'not-started') {
      throw new Error(`Runner for ${this.job.id} already launched (state=${this._state})`);
    }
    this._state = 'launching';
    this.startedAt = this.clock();

    const cwd = this.job.workingDirectory ?? process.cwd();
    const dirProblem = checkWorkingDirectory(this.job.workingDirectory);
    const resolved = resolveExecutable(this.job.command, cwd, this.env);
    const reason = dirProblem ?? (resolved.ok ? null : resolved.reason);
    if (reason !== null || !resolved.ok) {
      const result = this.finish('finished', {
        exitCode: 'launch-failure',
        signal: null,
        killed: false,
        error: reason ?? 'Executable could not be resolved',
      });
      return { status: 'failed', result };
    }

    const subprocess = execa(resolved.path, [...this.job.args], {
      cwd,
      env: this.env,
      extendEnv: false,
      stdin: 'ignore',
      buffer: false,
      reject: false,
      windowsHide: true,
    });
    this.kill = () => subprocess.kill('SIGKILL');
    this._state = 'running';

    const splitters = {
      stdout: this.capture('stdout', subprocess.stdout),
      stderr: this.capture('stderr', subprocess.stderr),
    };

    subprocess
      .then(toOutcome, (err: unknown): ProcessOutcome => ({ failed: true, shortMessage: errorMessage(err) }))
      .then((outcome) => this.onExit(outcome, splitters))
      .catch((err: unknown) => console.error(`[runner ${this.job.id}] exit handling failed:`, err));

    return { status: 'running' };
  }

  /** SIGKILL, no grace period. No-op unless the process is running. */
  terminate() {
    if (this._state !== 'running' || this.terminateRequested) return;
    this.terminateRequested = true;
    this.kill?.();
  }

  private capture(stream: OutputStream, readable: Readable): LineSplitter {
    const splitter = new LineSplitter();
    readable.on('data', (chunk: Buffer | string) => this.publish(stream, splitter.push(chunk)));
    readable.on('end', () => this.publish(stream, splitter.flush()));
    return splitter;
  }

  private publish(stream: OutputStream, lines: ReturnType<LineSplitter['push']>) {
    if (isTerminal(this._state)) return;
    for (const line of lines) {
      this.events.emit('line', { stream, text: line.text, lossy: line.lossy });
    }
  }

  private onExit(outcome: ProcessOutcome, splitters: Record<OutputStream, LineSplitter>) {
    this.publish('stdout', splitters.stdout.flush());
    this.publish('stderr', splitters.stderr.flush());
    const { state, fields } = classifyExit(outcome, this.terminateRequested);
    this.finish(state, fields);
  }

  private finish(state: TerminalState, fields: ExitFields): JobResult {
    this._state = state;
    this.kill = null;
    const result = makeResult(this.job, { ...fields, startedAt: this.startedAt, finishedAt: this.clock() });
    this.events.emit('exit', { result });
    return result;
  }
}
