/**
 * TCP transport channel to the execution host.
 *
 * One socket per Command. `open()` is bounded by a connect timeout,
 * `send()` and `receive()` by the caller's absolute deadline; when the
 * deadline passes the pending write or read is abandoned and the socket
 * destroyed, so no call ever waits on a host that stopped talking.
 */

import { createConnection, type Socket } from 'node:net';
import type { Connection, Endpoint, Transport } from '../types/socket.js';
import { ErrorKind } from '../types/errors.js';
import { RelayError, toRelayError } from '../core/relay-error.js';
import { FrameReader } from './frame-reader.js';
import { createLogger, type Logger } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface TcpTransportOptions {
  /** Milliseconds to wait for the TCP handshake. Default 5000. */
  connectTimeoutMs?: number;
  /** Largest response frame accepted. Default 16 MiB. */
  maxResponseBytes?: number;
  logger?: Logger;
}

const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
const DEFAULT_MAX_RESPONSE_BYTES = 16 * 1024 * 1024;

function describe(endpoint: Endpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

/** Map a socket error to a TRANSPORT RelayError with a readable message. */
export function transportError(err: NodeJS.ErrnoException, endpoint: Endpoint): RelayError {
  const where = describe(endpoint);
  let message: string;
  switch (err.code) {
    case 'ECONNREFUSED':
      message = `Connection refused by ${where}`;
      break;
    case 'ECONNRESET':
      message = `Connection reset by ${where}`;
      break;
    case 'EHOSTUNREACH':
    case 'ENETUNREACH':
      message = `Host unreachable: ${where}`;
      break;
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      message = `Cannot resolve host: ${endpoint.host}`;
      break;
    case 'EPIPE':
      message = `Connection to ${where} closed while sending`;
      break;
    default:
      message = `Socket error on ${where}: ${err.message}`;
  }
  return new RelayError({ kind: ErrorKind.TRANSPORT, message, cause: err });
}

// ---------------------------------------------------------------------------
// TcpConnection
// ---------------------------------------------------------------------------

type ReceiveResult = { ok: true; frame: Buffer } | { ok: false; error: RelayError };

interface Waiter {
  resolve: (frame: Buffer) => void;
  reject: (error: RelayError) => void;
  timer: ReturnType<typeof setTimeout>;
}

class TcpConnection implements Connection {
  private readonly socket: Socket;
  private readonly endpoint: Endpoint;
  private readonly reader: FrameReader;
  private frame: Buffer | null = null;
  private failure: RelayError | null = null;
  private ended = false;
  private closed = false;
  private waiter: Waiter | null = null;

  constructor(socket: Socket, endpoint: Endpoint, maxResponseBytes: number) {
    this.socket = socket;
    this.endpoint = endpoint;
    this.reader = new FrameReader(maxResponseBytes);

    socket.on('data', (chunk: Buffer) => this.handleData(chunk));
    socket.on('error', (err: NodeJS.ErrnoException) => this.handleError(err));
    socket.on('end', () => this.handleEnd());
    socket.on('close', () => this.handleEnd());
  }

  send(bytes: Buffer, deadline: number): Promise<void> {
    if (this.closed) {
      return Promise.reject(
        new RelayError({ kind: ErrorKind.TRANSPORT, message: 'Connection already closed' }),
      );
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      this.socket.destroy();
      return Promise.reject(this.sendTimeoutError(bytes.length));
    }

    return new Promise((resolve, reject) => {
      let settled = false;
      // A peer that stops reading leaves the write callback pending forever.
      const timer = setTimeout(() => {
        settled = true;
        this.socket.destroy();
        reject(this.sendTimeoutError(bytes.length));
      }, remaining);

      this.socket.write(bytes, (err?: Error | null) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        if (err) {
          reject(transportError(err, this.endpoint));
        } else {
          resolve();
        }
      });
    });
  }

  receive(deadline: number): Promise<Buffer> {
    if (this.waiter) {
      return Promise.reject(
        new RelayError({ kind: ErrorKind.TRANSPORT, message: 'A receive is already pending' }),
      );
    }

    const ready = this.poll();
    if (ready) {
      return ready.ok ? Promise.resolve(ready.frame) : Promise.reject(ready.error);
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      this.socket.destroy();
      return Promise.reject(this.timeoutError());
    }

    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        this.socket.destroy();
        reject(this.timeoutError());
      }, remaining);
      this.waiter = { resolve, reject, timer };
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      clearTimeout(this.waiter.timer);
      this.waiter.reject(
        new RelayError({ kind: ErrorKind.TRANSPORT, message: 'Connection closed while waiting' }),
      );
      this.waiter = null;
    }
    this.socket.destroy();
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private timeoutError(): RelayError {
    return new RelayError({
      kind: ErrorKind.TIMEOUT,
      message: `No response from ${describe(this.endpoint)} before the deadline`,
    });
  }

  private sendTimeoutError(byteLength: number): RelayError {
    return new RelayError({
      kind: ErrorKind.TIMEOUT,
      message: `Timed out sending ${byteLength} bytes to ${describe(this.endpoint)}`,
    });
  }

  private handleData(chunk: Buffer): void {
    if (this.frame || this.failure) return;
    try {
      this.frame = this.reader.push(chunk);
    } catch (err) {
      this.failure = toRelayError(err);
      this.socket.destroy();
    }
    this.notify();
  }

  private handleError(err: NodeJS.ErrnoException): void {
    if (!this.failure) {
      this.failure = transportError(err, this.endpoint);
    }
    this.notify();
  }

  private handleEnd(): void {
    if (this.ended) return;
    this.ended = true;
    this.notify();
  }

  private poll(): ReceiveResult | null {
    if (this.frame) return { ok: true, frame: this.frame };
    if (this.failure) return { ok: false, error: this.failure };
    if (this.ended) {
      const rest = this.reader.finish();
      if (rest.toString('utf-8').trim().length === 0) {
        return {
          ok: false,
          error: new RelayError({
            kind: ErrorKind.TRANSPORT,
            message: `Connection closed by ${describe(this.endpoint)} before a response was received`,
          }),
        };
      }
      return { ok: true, frame: rest };
    }
    return null;
  }

  private notify(): void {
    const waiter = this.waiter;
    if (!waiter) return;
    const ready = this.poll();
    if (!ready) return;

    clearTimeout(waiter.timer);
    this.waiter = null;
    if (ready.ok) {
      waiter.resolve(ready.frame);
    } else {
      waiter.reject(ready.error);
    }
  }
}

// ---------------------------------------------------------------------------
// TcpTransport
// ---------------------------------------------------------------------------

export class TcpTransport implements Transport {
  readonly endpoint: Endpoint;
  private readonly connectTimeoutMs: number;
  private readonly maxResponseBytes: number;
  private readonly logger: Logger;

  constructor(endpoint: Endpoint, options?: TcpTransportOptions) {
    this.endpoint = { ...endpoint };
    this.connectTimeoutMs = options?.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.maxResponseBytes = options?.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;
    this.logger = options?.logger ?? createLogger('transport');
  }

  open(deadline?: number): Promise<Connection> {
    const { host, port } = this.endpoint;
    const waitMs =
      deadline === undefined
        ? this.connectTimeoutMs
        : Math.max(1, Math.min(this.connectTimeoutMs, deadline - Date.now()));

    return new Promise<Connection>((resolve, reject) => {
      const socket = createConnection({ host, port });

      const timer = setTimeout(() => {
        socket.destroy();
        this.logger.debug('connect timed out', {
          endpoint: describe(this.endpoint),
          timeout_ms: waitMs,
        });
        reject(
          new RelayError({
            kind: ErrorKind.TRANSPORT,
            message: `Timed out connecting to ${describe(this.endpoint)} after ${waitMs}ms`,
          }),
        );
      }, waitMs);

      const onError = (err: NodeJS.ErrnoException): void => {
        clearTimeout(timer);
        socket.destroy();
        this.logger.debug('connect failed', {
          endpoint: describe(this.endpoint),
          errno: err.code,
        });
        reject(transportError(err, this.endpoint));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.removeListener('error', onError);
        socket.setNoDelay(true);
        resolve(new TcpConnection(socket, this.endpoint, this.maxResponseBytes));
      });
    });
  }
}
