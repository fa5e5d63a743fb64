/**
 * Raised synchronously for bad configuration or bad input.
 * Per-job runtime failures are never thrown; they travel as JobResult values.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class InvalidJobError extends ValidationError {
  readonly index: number;

  constructor(index: number, reason: string) {
    super(`Invalid job at position ${index}: ${reason}`);
    this.name = 'InvalidJobError';
    this.index = index;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
