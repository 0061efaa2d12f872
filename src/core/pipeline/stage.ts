/**
 * Pipeline stages and their resolution into Commands.
 *
 * A Stage is defined once, when the pipeline is built, and never changes.
 * Its Command is resolved lazily, right before the stage runs, so a
 * script edited between runs is picked up and a missing script only
 * fails the stage that needs it.
 */

import type { RelayConfig, SendAs, StageConfig } from '../../types/config.js';
import type { Command } from '../../types/protocol.js';
import { createCommand } from '../../ipc/codec.js';
import type { ScriptSource } from '../script-source.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StageSource = { kind: 'file'; path: string } | { kind: 'inline'; code: string };

export interface Stage {
  readonly name: string;
  readonly label: string;
  readonly source: StageSource;
  /** `code` sends the script text, `path` asks the host to load the file itself. */
  readonly sendAs: SendAs;
  readonly attempts: number;
  readonly timeoutMs: number;
  readonly retryOnApplicationError: boolean;
}

export interface StageInput {
  name: string;
  label?: string;
  source: StageSource;
  sendAs?: SendAs;
  attempts: number;
  timeoutMs: number;
  retryOnApplicationError?: boolean;
}

// ---------------------------------------------------------------------------
// defineStage
// ---------------------------------------------------------------------------

/**
 * Build an immutable Stage.
 *
 * @throws Error if the name is empty, the retry knobs are not positive
 *   integers, or an inline stage asks to be sent as a path.
 */
export function defineStage(input: StageInput): Stage {
  if (input.name.trim().length === 0) {
    throw new Error('Stage name must not be empty');
  }
  if (!Number.isInteger(input.attempts) || input.attempts < 1) {
    throw new Error(`Stage "${input.name}": attempts must be a positive integer`);
  }
  if (!Number.isInteger(input.timeoutMs) || input.timeoutMs < 1) {
    throw new Error(`Stage "${input.name}": timeoutMs must be a positive integer`);
  }
  const sendAs = input.sendAs ?? 'code';
  if (sendAs === 'path' && input.source.kind !== 'file') {
    throw new Error(`Stage "${input.name}": only file stages can be sent as a path`);
  }

  return Object.freeze({
    name: input.name,
    label: input.label ?? input.name,
    source: Object.freeze({ ...input.source }),
    sendAs,
    attempts: input.attempts,
    timeoutMs: input.timeoutMs,
    retryOnApplicationError: input.retryOnApplicationError ?? false,
  });
}

/** Build the ordered Stage list from a parsed config. */
export function stagesFromConfig(config: RelayConfig): Stage[] {
  return config.stages.map((entry: StageConfig) =>
    defineStage({
      name: entry.name,
      label: entry.label,
      source:
        entry.script !== undefined
          ? { kind: 'file', path: entry.script }
          : { kind: 'inline', code: entry.code ?? '' },
      sendAs: entry.send_as,
      attempts: entry.attempts ?? config.retry.max_attempts,
      timeoutMs: entry.timeout_ms ?? config.retry.base_timeout_ms,
      retryOnApplicationError: entry.retry_on_application_error,
    }),
  );
}

// ---------------------------------------------------------------------------
// resolveCommand
// ---------------------------------------------------------------------------

/**
 * Turn a Stage into the Command it sends.
 *
 * @throws RelayError(INVALID_COMMAND) if the script file cannot be read.
 */
export async function resolveCommand(stage: Stage, scripts: ScriptSource): Promise<Command> {
  const base = {
    label: stage.label,
    retryOnApplicationError: stage.retryOnApplicationError,
  };

  if (stage.source.kind === 'inline') {
    return createCommand({ ...base, kind: 'execute_code', payload: stage.source.code });
  }
  if (stage.sendAs === 'path') {
    return createCommand({
      ...base,
      kind: 'execute_file',
      payload: scripts.resolvePath(stage.source.path),
    });
  }
  const code = await scripts.readScript(stage.source.path);
  return createCommand({ ...base, kind: 'execute_code', payload: code });
}
