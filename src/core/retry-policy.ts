/**
 * Retry policy: bounded re-attempts of a single Command.
 *
 * Attempt n waits up to min(base × multiplier^(n-1), maxTimeout) for the
 * host; between attempts the policy pauses min(initialBackoff × 2^(n-1),
 * maxBackoff). Debug mode scales the attempt budget and base timeout
 * down through `scaleForDebug()`; the loop itself is the same in both
 * modes.
 */

import type { Command, Response } from '../types/protocol.js';
import { ErrorKind, type ErrorKindValue, type ErrorPayload } from '../types/errors.js';
import { RelayError, toRelayError } from './relay-error.js';
import { createLogger, type Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What the policy needs from the execution client. */
export interface CommandExecutor {
  execute(command: Command, timeoutMs: number): Promise<Response>;
}

/** Backoff shape shared by every run of one policy. */
export interface BackoffOptions {
  /** Per-attempt timeout growth factor. Default 1.5. */
  timeoutMultiplier?: number;
  /** Upper bound for any attempt's timeout. Default 120 000 ms. */
  maxTimeoutMs?: number;
  /** Pause after the first failed attempt. Default 500 ms. */
  initialBackoffMs?: number;
  /** Upper bound for any pause. Default 8 000 ms. */
  maxBackoffMs?: number;
}

export interface RetryPolicyOptions extends BackoffOptions {
  logger?: Logger;
  /** Injectable pause for tests. */
  sleep?: (ms: number) => Promise<void>;
}

/** Per-run knobs. */
export interface RunOptions {
  attempts: number;
  baseTimeoutMs: number;
  debug?: boolean;
}

/** One attempt as recorded in an Outcome. */
export interface AttemptRecord {
  attempt: number;
  timeoutMs: number;
  durationMs: number;
  kind?: ErrorKindValue;
  message?: string;
}

export type Outcome =
  | { status: 'success'; response: Response; attempts: number; history: AttemptRecord[] }
  | { status: 'failed'; error: ErrorPayload; attempts: number; history: AttemptRecord[] };

/** The two knobs debug mode scales. */
export interface RetryKnobs {
  attempts: number;
  baseTimeoutMs: number;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_BACKOFF: Required<BackoffOptions> = {
  timeoutMultiplier: 1.5,
  maxTimeoutMs: 120_000,
  initialBackoffMs: 500,
  maxBackoffMs: 8_000,
};

/** Debug mode halves the attempt budget. */
export const DEBUG_ATTEMPT_DIVISOR = 2;
/** Debug mode quarters the base timeout. */
export const DEBUG_TIMEOUT_DIVISOR = 4;

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

// ---------------------------------------------------------------------------
// Pure schedule helpers
// ---------------------------------------------------------------------------

/**
 * Scale the retry knobs for debug mode. Never increases either value and
 * never drops below one attempt or one millisecond.
 */
export function scaleForDebug(knobs: RetryKnobs, debug: boolean): RetryKnobs {
  if (!debug) {
    return { ...knobs };
  }
  return {
    attempts: Math.max(1, Math.floor(knobs.attempts / DEBUG_ATTEMPT_DIVISOR)),
    baseTimeoutMs: Math.max(1, Math.floor(knobs.baseTimeoutMs / DEBUG_TIMEOUT_DIVISOR)),
  };
}

/** Timeout for 1-based attempt `n`. Attempt 1 always gets the full base. */
export function attemptTimeout(
  n: number,
  baseTimeoutMs: number,
  backoff: Required<BackoffOptions>,
): number {
  const grown = Math.round(baseTimeoutMs * backoff.timeoutMultiplier ** (n - 1));
  return Math.max(baseTimeoutMs, Math.min(grown, backoff.maxTimeoutMs));
}

/** Pause after failed 1-based attempt `n`. */
export function pauseAfter(n: number, backoff: Required<BackoffOptions>): number {
  return Math.min(backoff.initialBackoffMs * 2 ** (n - 1), backoff.maxBackoffMs);
}

// ---------------------------------------------------------------------------
// RetryPolicy
// ---------------------------------------------------------------------------

export class RetryPolicy {
  private readonly executor: CommandExecutor;
  private readonly backoff: Required<BackoffOptions>;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(executor: CommandExecutor, options?: RetryPolicyOptions) {
    this.executor = executor;
    this.backoff = {
      timeoutMultiplier: options?.timeoutMultiplier ?? DEFAULT_BACKOFF.timeoutMultiplier,
      maxTimeoutMs: options?.maxTimeoutMs ?? DEFAULT_BACKOFF.maxTimeoutMs,
      initialBackoffMs: options?.initialBackoffMs ?? DEFAULT_BACKOFF.initialBackoffMs,
      maxBackoffMs: options?.maxBackoffMs ?? DEFAULT_BACKOFF.maxBackoffMs,
    };
    this.logger = options?.logger ?? createLogger('retry');
    this.sleep = options?.sleep ?? defaultSleep;
  }

  /**
   * Run a Command until it succeeds, fails non-retriably, or the attempt
   * budget is spent. Never throws for round-trip failures; they are
   * reported in the Outcome. Performs at most `attempts` executions.
   */
  async run(command: Command, options: RunOptions): Promise<Outcome> {
    const { attempts, baseTimeoutMs } = scaleForDebug(
      { attempts: options.attempts, baseTimeoutMs: options.baseTimeoutMs },
      options.debug ?? false,
    );
    const history: AttemptRecord[] = [];
    let lastError: RelayError | null = null;

    for (let n = 1; n <= attempts; n++) {
      const timeoutMs = attemptTimeout(n, baseTimeoutMs, this.backoff);
      const startTime = Date.now();

      let error: RelayError;
      try {
        const response = await this.executor.execute(command, timeoutMs);
        const durationMs = Date.now() - startTime;

        if (response.status === 'success') {
          history.push({ attempt: n, timeoutMs, durationMs });
          this.logger.debug('attempt succeeded', {
            command: command.label,
            attempt: n,
            duration_ms: durationMs,
          });
          return { status: 'success', response, attempts: n, history };
        }

        error = new RelayError({
          kind: ErrorKind.APPLICATION,
          message: response.message ?? 'Unknown error',
          retriable: command.retryOnApplicationError,
        });
      } catch (err) {
        error = toRelayError(err);
      }

      const durationMs = Date.now() - startTime;
      history.push({ attempt: n, timeoutMs, durationMs, kind: error.kind, message: error.message });
      lastError = error;

      if (!error.retriable) {
        this.logger.warn('non-retriable failure', {
          command: command.label,
          attempt: n,
          error_kind: error.kind,
          error: error.message,
        });
        return { status: 'failed', error: error.toErrorPayload(), attempts: n, history };
      }

      if (n < attempts) {
        const pauseMs = pauseAfter(n, this.backoff);
        this.logger.warn('attempt failed, retrying', {
          command: command.label,
          attempt: n,
          error_kind: error.kind,
          error: error.message,
          pause_ms: pauseMs,
        });
        await this.sleep(pauseMs);
      }
    }

    const final =
      lastError ??
      new RelayError({ kind: ErrorKind.INVALID_COMMAND, message: 'No attempts were made' });
    this.logger.warn('attempts exhausted', {
      command: command.label,
      attempt: history.length,
      error_kind: final.kind,
      error: final.message,
    });
    return { status: 'failed', error: final.toErrorPayload(), attempts: history.length, history };
  }
}
