export { ParallelManager, validateMaxParallel, MIN_PARALLEL, MAX_PARALLEL, DEFAULT_PARALLEL } from './core/scheduler.js';
export type { SchedulerOptions, QueueSnapshot } from './core/scheduler.js';
export { ProcessRunner } from './core/runner.js';
export type { JobRunner, RunnerFactory, RunnerOptions } from './core/runner.js';
export { EventBus } from './core/event_bus.js';
export { FileLogSink, MemoryLogSink } from './core/log_sink.js';
export type { LogSink } from './core/log_sink.js';
export { sanitizeLine } from './core/sanitize.js';
export { ValidationError, InvalidJobError } from './core/errors.js';
export type {
  ExitSentinel,
  Job,
  JobResult,
  JobSpec,
  LaunchOutcome,
  OutputLine,
  OutputStream,
  RunnerEvents,
  RunnerState,
  SchedulerEvents,
  TerminalState,
} from './core/types.js';
export { formatExitCode, commandLine } from './core/types.js';
export { prepareJobs, consoleArgs } from './batch/prepare.js';
export { assembleScript, scriptItemFromPath } from './batch/script.js';
export type { ScriptItem } from './batch/script.js';
export { SettingsSchema, parseSettings } from './config/settings.js';
export type { Settings } from './config/settings.js';
