/**
 * RelayError: structured error class for failed Command round trips.
 *
 * The transport, codec and execution client throw RelayError so that
 * the retry policy can decide from `kind` alone whether another attempt
 * is allowed. Anything else that escapes a round trip is normalised by
 * `toRelayError()`.
 */

import type { ErrorKindValue, ErrorPayload } from '../types/errors.js';
import { ERROR_RETRIABLE_DEFAULTS, ErrorKind } from '../types/errors.js';

/**
 * Private symbol used to brand RelayError instances, so the guard also
 * holds across duplicated module instances.
 */
const RELAY_ERROR_BRAND = Symbol.for('scriptrelay.RelayError');

/** Options for constructing a RelayError. */
export interface RelayErrorOptions {
  kind: ErrorKindValue;
  message: string;
  /** Defaults to ERROR_RETRIABLE_DEFAULTS[kind]. */
  retriable?: boolean;
  cause?: unknown;
}

export class RelayError extends Error {
  readonly kind: ErrorKindValue;
  readonly retriable: boolean;

  /** @internal */
  readonly [RELAY_ERROR_BRAND] = true as const;

  constructor(options: RelayErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RelayError';
    this.kind = options.kind;
    this.retriable = options.retriable ?? ERROR_RETRIABLE_DEFAULTS[options.kind];
  }

  /** Serialisable form for outcomes, journal rows and CLI output. */
  toErrorPayload(): ErrorPayload {
    return {
      kind: this.kind,
      message: this.message,
      retriable: this.retriable,
    };
  }
}

/** Brand-checked type guard for RelayError instances. */
export function isRelayError(value: unknown): value is RelayError {
  if (value instanceof RelayError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    RELAY_ERROR_BRAND in value &&
    Reflect.get(value, RELAY_ERROR_BRAND) === true
  );
}

/**
 * Normalise any thrown value into a RelayError. Unknown failures during a
 * round trip are socket-level as far as the caller can tell, so they are
 * classified as TRANSPORT.
 */
export function toRelayError(value: unknown): RelayError {
  if (isRelayError(value)) {
    return value;
  }
  const message = value instanceof Error ? value.message : String(value);
  return new RelayError({ kind: ErrorKind.TRANSPORT, message, cause: value });
}
