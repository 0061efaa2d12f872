/**
 * Command codec: request encoding and response decoding.
 *
 * Requests are one JSON object followed by a newline. JSON string
 * escaping turns every newline, quote, brace and backslash inside a
 * script into an escape sequence, so payload text cannot break framing
 * and round-trips byte-for-byte.
 *
 * Decoding never falls back to a default: anything that is not a
 * well-formed `{status, result?, message?}` object is a DECODE error.
 */

import { RelayError } from '../core/relay-error.js';
import { ErrorKind } from '../types/errors.js';
import {
  COMMAND_KINDS,
  PAYLOAD_FIELD,
  type Command,
  type CommandKind,
  type RequestMessage,
  type Response,
} from '../types/protocol.js';

/** Default cap on an encoded request. */
export const DEFAULT_MAX_REQUEST_BYTES = 16 * 1024 * 1024;

// ---------------------------------------------------------------------------
// createCommand
// ---------------------------------------------------------------------------

export interface CommandInput {
  kind?: CommandKind;
  payload: string;
  label?: string;
  retryOnApplicationError?: boolean;
}

/** Build an immutable Command. Defaults to `execute_code` labelled "code". */
export function createCommand(input: CommandInput): Command {
  return Object.freeze({
    kind: input.kind ?? 'execute_code',
    payload: input.payload,
    label: input.label ?? 'code',
    retryOnApplicationError: input.retryOnApplicationError ?? false,
  });
}

// ---------------------------------------------------------------------------
// encode
// ---------------------------------------------------------------------------

function invalid(message: string): RelayError {
  return new RelayError({ kind: ErrorKind.INVALID_COMMAND, message });
}

/** Build the wire message for a Command. */
export function toRequestMessage(command: Command): RequestMessage {
  const params: RequestMessage['params'] = {};
  params[PAYLOAD_FIELD[command.kind]] = command.payload;
  if (command.label.length > 0) {
    params.label = command.label;
  }
  return { type: command.kind, params };
}

/**
 * Reject a Command that can never succeed, before any socket is opened.
 *
 * @throws RelayError(INVALID_COMMAND)
 */
export function assertEncodable(
  command: Command,
  maxRequestBytes: number = DEFAULT_MAX_REQUEST_BYTES,
): void {
  if (!COMMAND_KINDS.includes(command.kind)) {
    throw invalid(`Unknown command kind: "${String(command.kind)}"`);
  }
  if (typeof command.payload !== 'string' || command.payload.trim().length === 0) {
    throw invalid(`Command "${command.label}" has an empty payload`);
  }
  const byteLength = encode(command).length;
  if (byteLength > maxRequestBytes) {
    throw invalid(
      `Command "${command.label}" exceeds request size limit: ` +
        `${byteLength} bytes > ${maxRequestBytes} byte limit`,
    );
  }
}

/** Serialise a Command as one newline-terminated JSON message. */
export function encode(command: Command): Buffer {
  return Buffer.from(JSON.stringify(toRequestMessage(command)) + '\n', 'utf-8');
}

// ---------------------------------------------------------------------------
// decode
// ---------------------------------------------------------------------------

function malformed(message: string): RelayError {
  return new RelayError({ kind: ErrorKind.DECODE, message });
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Decode one response frame.
 *
 * @throws RelayError(DECODE) for empty, partial or non-conforming bytes.
 */
export function decode(bytes: Buffer): Response {
  const text = bytes.toString('utf-8').trim();
  if (text.length === 0) {
    throw malformed('Empty response from host');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw malformed(`Malformed response (${bytes.length} bytes): not valid JSON`);
  }

  if (!isJsonObject(parsed)) {
    throw malformed('Malformed response: expected a JSON object');
  }

  const status = parsed['status'];
  if (status !== 'success' && status !== 'error') {
    throw malformed(`Malformed response: unknown status ${JSON.stringify(status) ?? 'undefined'}`);
  }

  const response: Response = { status };
  const result = asText(parsed['result']);
  if (result !== undefined) response.result = result;
  const message = asText(parsed['message']);
  if (message !== undefined) response.message = message;
  if (status === 'error' && response.message === undefined) {
    response.message = 'Unknown error';
  }
  return response;
}
