import { describe, it, expect } from 'vitest';
import { FrameReader } from './frame-reader.js';

const bytes = (text: string) => Buffer.from(text, 'utf-8');
const text = (frame: Buffer | null) => (frame === null ? null : frame.toString('utf-8'));

describe('FrameReader', () => {
  it('completes on the closing brace when the host sends no newline', () => {
    const reader = new FrameReader(1024);
    expect(text(reader.push(bytes('{"status":"success","result":"ok"}')))).toBe(
      '{"status":"success","result":"ok"}',
    );
  });

  it('reassembles a message split across reads', () => {
    const reader = new FrameReader(1024);
    expect(reader.push(bytes('{"status":"suc'))).toBeNull();
    expect(reader.push(bytes('cess","result":'))).toBeNull();
    expect(text(reader.push(bytes('"done"}')))).toBe('{"status":"success","result":"done"}');
  });

  it('ignores braces, brackets and newlines inside strings', () => {
    const reader = new FrameReader(1024);
    const message = '{"status":"success","result":"}\\n]\\"{\\\\"}';
    expect(reader.push(bytes(message.slice(0, 30)))).toBeNull();
    expect(text(reader.push(bytes(message.slice(30))))).toBe(message);
  });

  it('handles an escape split across chunks', () => {
    const reader = new FrameReader(1024);
    expect(reader.push(bytes('{"result":"a\\'))).toBeNull();
    expect(reader.push(bytes('"}'))).toBeNull();
    expect(text(reader.push(bytes('"}')))).toBe('{"result":"a\\"}"}');
  });

  it('handles a multi-byte character split across chunks', () => {
    const reader = new FrameReader(1024);
    const whole = bytes('{"result":"日本"}');
    expect(reader.push(whole.subarray(0, 12))).toBeNull();
    expect(reader.push(whole.subarray(12, 14))).toBeNull();
    expect(text(reader.push(whole.subarray(14)))).toBe('{"result":"日本"}');
  });

  it('waits for nested objects to close', () => {
    const reader = new FrameReader(1024);
    expect(reader.push(bytes('{"result":{"a":[1,{"b":2}]}'))).toBeNull();
    expect(text(reader.push(bytes('}')))).toBe('{"result":{"a":[1,{"b":2}]}}');
  });

  it('skips leading whitespace', () => {
    const reader = new FrameReader(1024);
    expect(text(reader.push(bytes('\r\n  {"status":"success"}')))).toBe('{"status":"success"}');
  });

  it('completes on a newline at depth zero for non-object lines', () => {
    const reader = new FrameReader(1024);
    expect(text(reader.push(bytes('not json at all\nmore')))).toBe('not json at all');
  });

  it('throws DECODE once an unterminated frame passes the limit', () => {
    const reader = new FrameReader(16);
    expect(reader.push(bytes('{"result":"'))).toBeNull();
    expect(() => reader.push(bytes('x'.repeat(10)))).toThrow('Response exceeds the 16 byte limit');
  });

  it('throws DECODE for a complete frame larger than the limit', () => {
    const reader = new FrameReader(8);
    expect(() => reader.push(bytes('{"status":"success"}'))).toThrow(
      'Response exceeds the 8 byte limit',
    );
  });

  it('returns a large frame whole, never truncated', () => {
    const result = 'v'.repeat(200_000);
    const message = JSON.stringify({ status: 'success', result });
    const reader = new FrameReader(1024 * 1024);
    let frame: Buffer | null = null;
    for (let offset = 0; offset < message.length; offset += 8192) {
      frame = reader.push(bytes(message.slice(offset, offset + 8192)));
    }
    expect(frame?.length).toBe(message.length);
  });

  it('hands back buffered bytes on finish', () => {
    const reader = new FrameReader(1024);
    reader.push(bytes('  {"status":'));
    expect(reader.bufferedBytes).toBe(12);
    expect(reader.finish().toString('utf-8')).toBe('{"status":');
  });
});
