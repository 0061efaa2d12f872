/**
 * Response framing for the host socket.
 *
 * The host writes exactly one JSON message per connection, but it may
 * arrive across any number of TCP reads and the host is not required to
 * end it with a newline. FrameReader accumulates chunks and reports a
 * complete frame when it sees either:
 *
 *   - a newline outside any JSON string at nesting depth 0, or
 *   - the bracket that closes the top-level JSON object or array.
 *
 * Scanning works on raw bytes: every structural JSON character is ASCII
 * and UTF-8 continuation bytes are all >= 0x80, so a multi-byte character
 * split across two chunks can never be mistaken for a delimiter.
 */

import { RelayError } from '../core/relay-error.js';
import { ErrorKind } from '../types/errors.js';

const NEWLINE = 0x0a;
const QUOTE = 0x22;
const BACKSLASH = 0x5c;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;

function isWhitespace(byte: number): boolean {
  return byte === 0x20 || byte === 0x09 || byte === 0x0a || byte === 0x0d;
}

export class FrameReader {
  private readonly maxBytes: number;
  private buffer: Buffer = Buffer.alloc(0);
  private scanned = 0;
  private frameStart = 0;
  private depth = 0;
  private inString = false;
  private escaped = false;
  private started = false;

  constructor(maxBytes: number) {
    this.maxBytes = maxBytes;
  }

  /** Bytes buffered so far, including any skipped leading whitespace. */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  /**
   * Append a chunk. Returns the complete frame once a terminator has been
   * seen, or null if more bytes are needed.
   *
   * @throws RelayError(DECODE) if the frame grows past `maxBytes`.
   */
  push(chunk: Buffer): Buffer | null {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    for (let i = this.scanned; i < this.buffer.length; i++) {
      const byte = this.buffer[i];

      if (this.escaped) {
        this.escaped = false;
        continue;
      }
      if (this.inString) {
        if (byte === BACKSLASH) this.escaped = true;
        else if (byte === QUOTE) this.inString = false;
        continue;
      }

      if (!this.started) {
        if (isWhitespace(byte)) {
          this.frameStart = i + 1;
          continue;
        }
        this.started = true;
      }

      if (byte === QUOTE) {
        this.inString = true;
      } else if (byte === OPEN_BRACE || byte === OPEN_BRACKET) {
        this.depth++;
      } else if (byte === CLOSE_BRACE || byte === CLOSE_BRACKET) {
        this.depth--;
        if (this.depth <= 0) {
          this.scanned = i + 1;
          return this.complete(i + 1);
        }
      } else if (byte === NEWLINE && this.depth === 0) {
        this.scanned = i + 1;
        return this.complete(i);
      }
    }

    this.scanned = this.buffer.length;
    this.checkSize(this.buffer.length);
    return null;
  }

  private complete(end: number): Buffer {
    this.checkSize(end);
    return this.buffer.subarray(this.frameStart, end);
  }

  private checkSize(end: number): void {
    if (end - this.frameStart > this.maxBytes) {
      throw new RelayError({
        kind: ErrorKind.DECODE,
        message: `Response exceeds the ${this.maxBytes} byte limit`,
      });
    }
  }

  /**
   * Whatever is buffered when the peer closes without a terminator. The
   * decoder decides whether it is a complete message.
   */
  finish(): Buffer {
    return this.buffer.subarray(this.frameStart);
  }
}
