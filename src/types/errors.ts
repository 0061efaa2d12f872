/**
 * Error taxonomy for remote script execution.
 *
 * Every failure the relay can observe falls into exactly one kind. The
 * kind decides whether the retry policy may re-attempt a Command.
 */

// ---------------------------------------------------------------------------
// ErrorKind
// ---------------------------------------------------------------------------

/** Failure kinds, keyed by their own value. */
export const ErrorKind = {
  /** Socket-level failure: refused, reset, unreachable, closed early. */
  TRANSPORT: 'TRANSPORT',
  /** Deadline exceeded while connecting or awaiting response bytes. */
  TIMEOUT: 'TIMEOUT',
  /** Bytes received but not a well-formed Response. */
  DECODE: 'DECODE',
  /** Well-formed Response with `status: "error"`. */
  APPLICATION: 'APPLICATION',
  /** Command rejected locally, before any network call. */
  INVALID_COMMAND: 'INVALID_COMMAND',
} as const;

export type ErrorKindValue = (typeof ErrorKind)[keyof typeof ErrorKind];

// ---------------------------------------------------------------------------
// Retriable defaults
// ---------------------------------------------------------------------------

/**
 * Whether a failure of each kind may be retried without the Command
 * opting in. APPLICATION failures re-run a script with side effects, so
 * they are only retried for Commands marked `retryOnApplicationError`.
 */
export const ERROR_RETRIABLE_DEFAULTS: Record<ErrorKindValue, boolean> = {
  TRANSPORT: true,
  TIMEOUT: true,
  DECODE: true,
  APPLICATION: false,
  INVALID_COMMAND: false,
};

const VALID_KINDS: ReadonlySet<string> = new Set(Object.values(ErrorKind));

/** Type guard for error kind strings (e.g. read back from the journal). */
export function isErrorKind(value: unknown): value is ErrorKindValue {
  return typeof value === 'string' && VALID_KINDS.has(value);
}

// ---------------------------------------------------------------------------
// ErrorPayload
// ---------------------------------------------------------------------------

/** Serialisable error description carried by outcomes and results. */
export interface ErrorPayload {
  kind: ErrorKindValue;
  message: string;
  retriable: boolean;
}
