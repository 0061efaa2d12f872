import { describe, it, expect, afterEach } from 'vitest';
import { TcpTransport } from './transport.js';
import { FakeHost, closedPort } from '../testing/fake-host.js';
import type { Connection } from '../types/socket.js';
import { configureLogging, resetLogging } from '../core/logger.js';
import { createTestSink } from '../testing/factories.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const REQUEST = Buffer.from('{"type":"execute_code","params":{"code":"pass"}}\n', 'utf-8');

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected promise to reject');
}

describe('TcpTransport', () => {
  let host: FakeHost | undefined;
  let connection: Connection | undefined;

  afterEach(async () => {
    connection?.close();
    connection = undefined;
    if (host) await host.close();
    host = undefined;
  });

  function transportFor(h: FakeHost, maxResponseBytes?: number): TcpTransport {
    return new TcpTransport(
      { host: h.host, port: h.port },
      maxResponseBytes !== undefined ? { maxResponseBytes } : undefined,
    );
  }

  // -----------------------------------------------------------------------
  // Happy path
  // -----------------------------------------------------------------------

  it('sends a request and receives one frame', async () => {
    host = await FakeHost.start({ type: 'respond', body: { status: 'success', result: 'ok' } });
    connection = await transportFor(host).open();

    await connection.send(REQUEST, Date.now() + 2_000);
    const frame = await connection.receive(Date.now() + 2_000);

    expect(frame.toString('utf-8')).toBe('{"status":"success","result":"ok"}');
    expect(host.requests[0]?.raw).toBe('{"type":"execute_code","params":{"code":"pass"}}');
  });

  it('reassembles a response delivered in many small writes', async () => {
    const body = JSON.stringify({ status: 'success', result: 'r'.repeat(20_000) });
    host = await FakeHost.start({ type: 'chunked', body, chunkSize: 1_500, delayMs: 1 });
    connection = await transportFor(host).open();

    await connection.send(REQUEST, Date.now() + 2_000);
    const frame = await connection.receive(Date.now() + 5_000);

    expect(frame.toString('utf-8')).toBe(body);
  });

  it('reads a response far larger than one socket read without truncating', async () => {
    const body = JSON.stringify({ status: 'success', result: 'z'.repeat(2 * 1024 * 1024) });
    host = await FakeHost.start({ type: 'respond', body });
    connection = await transportFor(host).open();

    await connection.send(REQUEST, Date.now() + 2_000);
    const frame = await connection.receive(Date.now() + 5_000);

    expect(frame.length).toBe(Buffer.byteLength(body));
  });

  it('returns buffered bytes when the host closes without a terminator', async () => {
    host = await FakeHost.start({ type: 'raw', body: '{"status":"succ' });
    connection = await transportFor(host).open();

    await connection.send(REQUEST, Date.now() + 2_000);
    const frame = await connection.receive(Date.now() + 2_000);

    expect(frame.toString('utf-8')).toBe('{"status":"succ');
  });

  // -----------------------------------------------------------------------
  // Deadlines
  // -----------------------------------------------------------------------

  it('rejects with TIMEOUT at the deadline when the host never answers', async () => {
    host = await FakeHost.start({ type: 'silent' });
    connection = await transportFor(host).open();
    await connection.send(REQUEST, Date.now() + 2_000);

    const started = Date.now();
    const err = await rejectionOf(connection.receive(started + 150));
    const elapsed = Date.now() - started;

    expect(err).toMatchObject({ kind: 'TIMEOUT', retriable: true });
    expect(elapsed).toBeGreaterThanOrEqual(140);
    expect(elapsed).toBeLessThan(150 + 250);
  });

  it('rejects immediately when the deadline has already passed', async () => {
    host = await FakeHost.start({ type: 'silent' });
    connection = await transportFor(host).open();
    await connection.send(REQUEST, Date.now() + 2_000);

    const err = await rejectionOf(connection.receive(Date.now() - 1));
    expect(err).toMatchObject({
      kind: 'TIMEOUT',
      message: `No response from ${host.host}:${host.port} before the deadline`,
    });
  });

  it('rejects a second receive while one is pending', async () => {
    host = await FakeHost.start({ type: 'silent' });
    connection = await transportFor(host).open();
    await connection.send(REQUEST, Date.now() + 2_000);

    const first = connection.receive(Date.now() + 200);
    const err = await rejectionOf(connection.receive(Date.now() + 200));
    expect(err).toMatchObject({ kind: 'TRANSPORT', message: 'A receive is already pending' });
    await expect(first).rejects.toMatchObject({ kind: 'TIMEOUT' });
  });

  // -----------------------------------------------------------------------
  // Failures
  // -----------------------------------------------------------------------

  it('maps a refused connection to TRANSPORT', async () => {
    const port = await closedPort();
    const transport = new TcpTransport({ host: '127.0.0.1', port });

    const err = await rejectionOf(transport.open());
    expect(err).toMatchObject({
      kind: 'TRANSPORT',
      retriable: true,
      message: `Connection refused by 127.0.0.1:${port}`,
    });
  });

  it('logs the errno of a failed connect', async () => {
    const { sink, entries } = createTestSink();
    configureLogging({ level: 'debug', sink });
    try {
      const port = await closedPort();
      await rejectionOf(new TcpTransport({ host: '127.0.0.1', port }).open());

      const entry = entries.find((e) => e.msg === 'connect failed');
      expect(entry?.component).toBe('transport');
      expect(entry?.meta).toEqual({ endpoint: `127.0.0.1:${port}`, errno: 'ECONNREFUSED' });
    } finally {
      resetLogging();
    }
  });

  it('rejects a send whose deadline has already passed', async () => {
    host = await FakeHost.start({ type: 'silent' });
    connection = await transportFor(host).open();

    const err = await rejectionOf(connection.send(REQUEST, Date.now() - 1));
    expect(err).toMatchObject({
      kind: 'TIMEOUT',
      message: `Timed out sending ${REQUEST.length} bytes to ${host.host}:${host.port}`,
    });
    expect(host.requests).toHaveLength(0);
  });

  it('reports TRANSPORT when the host hangs up without answering', async () => {
    host = await FakeHost.start({ type: 'close' });
    connection = await transportFor(host).open();
    await connection.send(REQUEST, Date.now() + 2_000);

    const err = await rejectionOf(connection.receive(Date.now() + 2_000));
    expect(err).toMatchObject({ kind: 'TRANSPORT' });
  });

  it('fails with DECODE when the response exceeds the size limit', async () => {
    host = await FakeHost.start({
      type: 'respond',
      body: { status: 'success', result: 'y'.repeat(500) },
    });
    connection = await transportFor(host, 64).open();
    await connection.send(REQUEST, Date.now() + 2_000);

    const err = await rejectionOf(connection.receive(Date.now() + 2_000));
    expect(err).toMatchObject({ kind: 'DECODE', message: 'Response exceeds the 64 byte limit' });
  });

  // -----------------------------------------------------------------------
  // close()
  // -----------------------------------------------------------------------

  it('releases the socket on close and tolerates repeated calls', async () => {
    host = await FakeHost.start({ type: 'silent' });
    connection = await transportFor(host).open();
    await connection.send(REQUEST, Date.now() + 2_000);

    connection.close();
    connection.close();
    await host.waitForDisconnects();

    expect(host.openConnections).toBe(0);
    await expect(connection.send(REQUEST, Date.now() + 2_000)).rejects.toMatchObject({
      kind: 'TRANSPORT',
      message: 'Connection already closed',
    });
  });
});
