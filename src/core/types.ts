import type { LogSink } from './log_sink.js';

export type OutputStream = 'stdout' | 'stderr';

export type RunnerState = 'not-started' | 'launching' | 'running' | 'finished' | 'crashed' | 'killed';

export type TerminalState = Extract<RunnerState, 'finished' | 'crashed' | 'killed'>;

export type ExitSentinel = 'killed' | 'crashed' | 'launch-failure' | 'cancelled';

/** What a caller hands to `submit`: the invocation is fully resolved already. */
export interface JobSpec {
  displayName: string;
  command: string;
  args: readonly string[];
  workingDirectory?: string;
  logSink?: LogSink;
}

export interface Job {
  readonly id: string;
  readonly batchId: number;
  readonly displayName: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly workingDirectory?: string;
  readonly logSink?: LogSink;
}

export interface JobResult {
  readonly jobId: string;
  readonly displayName: string;
  readonly exitCode: number | ExitSentinel;
  readonly signal: string | null;
  readonly killed: boolean;
  readonly startedAt: Date | null;
  readonly finishedAt: Date;
  readonly succeeded: boolean;
  readonly error: string | null;
}

export interface OutputLine {
  stream: OutputStream;
  text: string;
  lossy: boolean;
}

export type LaunchOutcome =
  | { status: 'running' }
  | { status: 'failed'; result: JobResult };

export interface RunnerEvents {
  line: OutputLine;
  exit: { result: JobResult };
}

export interface SchedulerEvents {
  jobStarted: { job: Job };
  outputLine: OutputLine & { jobId: string; displayName: string };
  jobFinished: { job: Job; result: JobResult };
  queueEmpty: { results: JobResult[] };
}

export function isTerminal(state: RunnerState): state is TerminalState {
  return state === 'finished' || state === 'crashed' || state === 'killed';
}

export function formatExitCode(code: JobResult['exitCode']): string {
  return typeof code === 'number' ? String(code) : code;
}

export function commandLine(job: Pick<Job, 'command' | 'args'>): string {
  return [job.command, ...job.args].map((a) => (/\s/.test(a) ? `"${a}"` : a)).join(' ');
}

export function makeResult(
  job: Pick<Job, 'id' | 'displayName'>,
  fields: Omit<JobResult, 'jobId' | 'displayName' | 'succeeded'>
): JobResult {
  return Object.freeze({
    jobId: job.id,
    displayName: job.displayName,
    ...fields,
    succeeded: fields.exitCode === 0,
  });
}
