/**
 * Error taxonomy for the categorization engine.
 *
 * Oracle and store failures are modelled as typed errors so each boundary can
 * decide what to do with them. The enforcement path converts all of them into
 * an errorKind on the activity record.
 */

export type OracleErrorKind =
  | 'OracleUnreachable'
  | 'OracleTimeout'
  | 'OracleMalformedResponse'
  | 'OracleRateLimited';

export type StoreErrorKind = 'StoreReadFailure' | 'StoreWriteFailure';

/** Every kind that can end up on an activity record. */
export type ErrorKind =
  | OracleErrorKind
  | StoreErrorKind
  | 'InvalidPolicyValue'
  | 'InvalidDomain'
  | 'RequestAborted'
  | 'EngineFailure';

export class OracleError extends Error {
  readonly kind: OracleErrorKind;
  /** Server-suggested wait before the next call, for rate-limit replies. */
  readonly retryAfterMs?: number;

  constructor(
    kind: OracleErrorKind,
    message: string,
    options?: { cause?: unknown; retryAfterMs?: number },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'OracleError';
    this.kind = kind;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class StoreError extends Error {
  readonly kind: StoreErrorKind;
  readonly file: string;

  constructor(kind: StoreErrorKind, file: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`${kind} on ${file}${detail}`, { cause: options?.cause });
    this.name = 'StoreError';
    this.kind = kind;
    this.file = file;
  }
}

/** Raised to a waiting caller whose request was abandoned by the transport. */
export class RequestAbortedError extends Error {
  readonly kind = 'RequestAborted' as const;

  constructor(domain: string) {
    super(`Request for ${domain} aborted while classification was in flight`);
    this.name = 'RequestAbortedError';
  }
}

export function isOracleError(error: unknown): error is OracleError {
  return error instanceof OracleError;
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

/** The store kind behind a failed store call; anything else counts as a write failure. */
export function storeErrorKind(error: unknown): StoreErrorKind {
  return isStoreError(error) ? error.kind : 'StoreWriteFailure';
}

export function isRequestAborted(error: unknown): error is RequestAbortedError {
  return error instanceof RequestAbortedError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
