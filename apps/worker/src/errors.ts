import { ZodError } from 'zod';

export type ErrorCode =
  | 'CONFIGURATION_MISSING'
  | 'STORE_UNREADABLE'
  | 'PROBE_FAILURE'
  | 'PERSIST_FAILURE'
  | 'INVALID_ARGUMENT'
  | 'MISCONFIGURED'
  | 'INTERNAL';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;
  if (err instanceof ZodError) {
    return new AppError('INVALID_ARGUMENT', err.message, { cause: err });
  }
  return new AppError('INTERNAL', toErrorMessage(err), { cause: err });
}

// Operator misconfiguration stops the run with a distinct status; anything else
// reaching the top level is a bug.
export function exitCodeFor(err: unknown): number {
  return toAppError(err).code === 'MISCONFIGURED' ? 2 : 1;
}
