/**
 * Execution client: one Command, one connection, one response.
 *
 * Responsibilities:
 *   - Reject unencodable Commands before any socket is opened
 *   - Open a connection, send the encoded Command, await one frame
 *   - Decode the frame into a Response
 *   - Close the connection on every exit path
 *
 * A decoded `status: "error"` Response is returned, not thrown: whether
 * to retry a script that ran and failed is the retry policy's decision.
 */

import type { Command, Response } from '../types/protocol.js';
import type { Transport } from '../types/socket.js';
import { assertEncodable, decode, encode, DEFAULT_MAX_REQUEST_BYTES } from './codec.js';
import { toRelayError } from '../core/relay-error.js';
import type { ErrorPayload } from '../types/errors.js';
import { createLogger, type Logger } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface ExecutionClientOptions {
  /** Largest encoded request accepted. Default 16 MiB. */
  maxRequestBytes?: number;
  logger?: Logger;
}

/** Result of a reachability probe. */
export interface ProbeResult {
  reachable: boolean;
  latencyMs: number;
  error?: ErrorPayload;
}

// ---------------------------------------------------------------------------
// ExecutionClient
// ---------------------------------------------------------------------------

/**
 * Usage:
 * ```ts
 * const client = new ExecutionClient(new TcpTransport({ host: 'localhost', port: 9876 }));
 * const response = await client.execute(createCommand({ payload: 'print(1)' }), 10_000);
 * ```
 */
export class ExecutionClient {
  private readonly transport: Transport;
  private readonly maxRequestBytes: number;
  private readonly logger: Logger;

  constructor(transport: Transport, options?: ExecutionClientOptions) {
    this.transport = transport;
    this.maxRequestBytes = options?.maxRequestBytes ?? DEFAULT_MAX_REQUEST_BYTES;
    this.logger = options?.logger ?? createLogger('execution-client');
  }

  get endpoint(): string {
    return `${this.transport.endpoint.host}:${this.transport.endpoint.port}`;
  }

  /**
   * Execute one Command with `timeoutMs` as the deadline for the whole
   * round trip, measured from this call.
   *
   * @throws RelayError with kind INVALID_COMMAND, TRANSPORT, TIMEOUT or DECODE.
   */
  async execute(command: Command, timeoutMs: number): Promise<Response> {
    assertEncodable(command, this.maxRequestBytes);

    const startTime = Date.now();
    const deadline = startTime + timeoutMs;
    const bytes = encode(command);

    this.logger.debug('executing', {
      command: command.label,
      kind: command.kind,
      byteLength: bytes.length,
      timeout_ms: timeoutMs,
    });

    const connection = await this.transport.open(deadline);
    try {
      await connection.send(bytes, deadline);
      const frame = await connection.receive(deadline);
      const response = decode(frame);

      this.logger.debug('response received', {
        command: command.label,
        duration_ms: Date.now() - startTime,
        ok: response.status === 'success',
        byteLength: frame.length,
      });
      return response;
    } catch (err) {
      const error = toRelayError(err);
      this.logger.debug('round trip failed', {
        command: command.label,
        error_kind: error.kind,
        error: error.message,
        duration_ms: Date.now() - startTime,
      });
      throw error;
    } finally {
      connection.close();
    }
  }

  /**
   * Check that the host accepts connections, without sending a Command.
   * Never throws.
   */
  async probe(timeoutMs?: number): Promise<ProbeResult> {
    const startTime = Date.now();
    try {
      const connection = await this.transport.open(
        timeoutMs === undefined ? undefined : startTime + timeoutMs,
      );
      connection.close();
      return { reachable: true, latencyMs: Date.now() - startTime };
    } catch (err) {
      return {
        reachable: false,
        latencyMs: Date.now() - startTime,
        error: toRelayError(err).toErrorPayload(),
      };
    }
  }
}
