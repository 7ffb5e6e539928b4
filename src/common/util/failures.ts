/******************************************************************************
                                 Types
******************************************************************************/

export type FailureKind =
  | 'InvalidInput'
  | 'UnsupportedFormat'
  | 'TextExtractionFailure'
  | 'ExtractionEmpty'
  | 'InterpreterFailure'
  | 'PersistenceFailure'
  | 'NotFound';

/** Finer cause of an InterpreterFailure. */
export type InterpreterFailureReason =
  | 'ResponseFormatError'
  | 'InvalidJSON'
  | 'NotAnArray'
  | 'ProviderError';

export interface Failure {
  kind: FailureKind;
  message: string;
  reason?: InterpreterFailureReason;
  retryable: boolean;
  cause?: unknown;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: Failure };


/******************************************************************************
                                Functions
******************************************************************************/

const RETRYABLE_KINDS: ReadonlySet<FailureKind> = new Set(['PersistenceFailure']);

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  kind: FailureKind,
  message: string,
  options: { reason?: InterpreterFailureReason; cause?: unknown } = {},
): Result<T> {
  const retryable = RETRYABLE_KINDS.has(kind) || options.reason === 'ProviderError';
  return {
    ok: false,
    error: { kind, message, retryable, ...options },
  };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
