/**
 * Wire protocol types for the script execution host.
 *
 * One request and one response per TCP connection. Requests name the
 * operation in `type` and carry the script in `params`; responses carry
 * `status` plus an optional `result` or `message`.
 */

// ---------------------------------------------------------------------------
// Command kinds
// ---------------------------------------------------------------------------

/** Operation kinds understood by the host. */
export type CommandKind = 'execute_code' | 'execute_file';

export const COMMAND_KINDS: readonly CommandKind[] = ['execute_code', 'execute_file'] as const;

/** The `params` key that carries the payload for each kind. */
export const PAYLOAD_FIELD: Record<CommandKind, 'code' | 'path'> = {
  execute_code: 'code',
  execute_file: 'path',
};

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

/**
 * One request to execute a script remotely. Frozen by `createCommand()`
 * and consumed once per attempt by the execution client.
 */
export interface Command {
  readonly kind: CommandKind;
  /** Script text for `execute_code`, host-side path for `execute_file`. */
  readonly payload: string;
  /** Human-readable description used in logs and reports. */
  readonly label: string;
  /** Opt-in: the script is idempotent, so application errors may be retried. */
  readonly retryOnApplicationError: boolean;
}

// ---------------------------------------------------------------------------
// Wire messages
// ---------------------------------------------------------------------------

/** Request message as serialised on the wire. */
export interface RequestMessage {
  type: CommandKind;
  params: {
    code?: string;
    path?: string;
    label?: string;
  };
}

/** Response status values. */
export type ResponseStatus = 'success' | 'error';

/** Decoded host response. */
export interface Response {
  status: ResponseStatus;
  result?: string;
  message?: string;
}
