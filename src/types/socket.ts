/**
 * Transport abstraction interfaces.
 *
 * These interfaces decouple the execution client from the concrete TCP
 * implementation so that tests can swap in scripted connections without
 * touching real network I/O.
 *
 * A Connection is owned by exactly one Command round trip: opened, used
 * for one send and one receive, then closed on every exit path.
 */

// ---------------------------------------------------------------------------
// Endpoint
// ---------------------------------------------------------------------------

/** Fixed address of the execution host. */
export interface Endpoint {
  host: string;
  port: number;
}

// ---------------------------------------------------------------------------
// Connection
// ---------------------------------------------------------------------------

export interface Connection {
  /**
   * Write the whole buffer. Rejects with RelayError(TIMEOUT) if the peer has
   * not taken it by `deadline` (epoch milliseconds), RelayError(TRANSPORT)
   * on socket failure.
   */
  send(bytes: Buffer, deadline: number): Promise<void>;

  /**
   * Resolve with one complete response frame. Never settles later than
   * `deadline` (epoch milliseconds): rejects with RelayError(TIMEOUT) at the
   * deadline, RelayError(TRANSPORT) on socket failure and
   * RelayError(DECODE) if the frame exceeds the read limit.
   */
  receive(deadline: number): Promise<Buffer>;

  /** Release the socket. Idempotent. */
  close(): void;
}

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export interface Transport {
  readonly endpoint: Endpoint;

  /**
   * Establish one socket to the endpoint. The handshake wait is capped by
   * `deadline` (epoch milliseconds) when given. Rejects with
   * RelayError(TRANSPORT).
   */
  open(deadline?: number): Promise<Connection>;
}
