import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  configureLogging,
  resetLogging,
  NEVER_LOG_FIELDS,
  META_STRING_MAX_LENGTH,
  type LogEntry,
  type LogSink,
} from './logger.js';
import { createTestSink } from '../testing/factories.js';

describe('Logger', () => {
  let sink: LogSink;
  let entries: LogEntry[];

  beforeEach(() => {
    const test = createTestSink();
    sink = test.sink;
    entries = test.entries;
    configureLogging({ level: 'debug', sink });
  });

  afterEach(() => {
    resetLogging();
  });

  // -----------------------------------------------------------------------
  // Entry structure
  // -----------------------------------------------------------------------

  describe('log entry structure', () => {
    it('writes level, ts, component and msg', () => {
      createLogger('transport').info('connected');

      expect(entries).toHaveLength(1);
      expect(entries[0]).toEqual({
        level: 'info',
        ts: entries[0]?.ts,
        component: 'transport',
        msg: 'connected',
      });
    });

    it('uses ISO 8601 timestamps', () => {
      createLogger('core').info('test');
      const ts = entries[0]?.ts ?? '';
      expect(new Date(ts).toISOString()).toBe(ts);
    });

    it('keeps other metadata under meta', () => {
      createLogger('client').debug('response received', { byteLength: 120, kind: 'execute_code' });
      expect(entries[0]?.meta).toEqual({ byteLength: 120, kind: 'execute_code' });
    });

    it('omits meta when no metadata is given', () => {
      createLogger('core').info('plain');
      expect(entries[0]?.meta).toBeUndefined();
    });
  });

  // -----------------------------------------------------------------------
  // Promoted fields
  // -----------------------------------------------------------------------

  describe('promoted fields', () => {
    it('lifts run fields to the top level', () => {
      createLogger('retry').warn('attempt failed', {
        pipeline: 'castle',
        stage: 'walls',
        command: 'Build Walls',
        attempt: 2,
        duration_ms: 150,
        ok: false,
        error_kind: 'TIMEOUT',
        pause_ms: 1_000,
      });

      expect(entries[0]).toMatchObject({
        pipeline: 'castle',
        stage: 'walls',
        command: 'Build Walls',
        attempt: 2,
        duration_ms: 150,
        ok: false,
        error_kind: 'TIMEOUT',
        meta: { pause_ms: 1_000 },
      });
    });

    it('ignores promoted keys of the wrong type', () => {
      createLogger('retry').info('odd', { attempt: 'two' });
      expect(entries[0]?.attempt).toBeUndefined();
      expect(entries[0]?.meta).toBeUndefined();
    });
  });

  // -----------------------------------------------------------------------
  // Level filtering
  // -----------------------------------------------------------------------

  describe('level filtering', () => {
    it('filters out debug when level is info', () => {
      configureLogging({ level: 'info', sink });
      const logger = createLogger('core');

      logger.debug('filtered');
      logger.info('visible');

      expect(entries.map((e) => e.level)).toEqual(['info']);
    });

    it('only shows warn and error when level is warn', () => {
      configureLogging({ level: 'warn', sink });
      const logger = createLogger('core');

      logger.debug('filtered');
      logger.info('filtered');
      logger.warn('visible');
      logger.error('visible');

      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('applies a level change to existing loggers', () => {
      const logger = createLogger('core');

      configureLogging({ level: 'error' });
      logger.info('filtered');
      expect(entries).toHaveLength(0);

      configureLogging({ level: 'debug' });
      logger.info('visible');
      expect(entries).toHaveLength(1);
    });

    it('resets to info', () => {
      resetLogging();
      configureLogging({ sink });

      const logger = createLogger('core');
      logger.debug('filtered');
      logger.info('visible');

      expect(entries.map((e) => e.level)).toEqual(['info']);
    });
  });

  // -----------------------------------------------------------------------
  // child and withContext
  // -----------------------------------------------------------------------

  describe('child loggers', () => {
    it('nests component names', () => {
      createLogger('pipeline').child('stage').child('resolve').warn('missing');
      expect(entries[0]?.component).toBe('pipeline:stage:resolve');
    });

    it('binds context to every entry', () => {
      const logger = createLogger('orchestrator').withContext({ pipeline: 'castle' });
      logger.withContext({ stage: 'roof' }).child('runner').info('stage started');

      expect(entries[0]).toMatchObject({
        component: 'orchestrator:runner',
        pipeline: 'castle',
        stage: 'roof',
      });
    });

    it('lets metadata override bound context', () => {
      createLogger('orchestrator')
        .withContext({ stage: 'bound' })
        .info('moved', { stage: 'explicit' });
      expect(entries[0]?.stage).toBe('explicit');
    });
  });

  // -----------------------------------------------------------------------
  // Sanitizing
  // -----------------------------------------------------------------------

  describe('metadata sanitizing', () => {
    it('serializes Error objects', () => {
      createLogger('core').error('failed', { error: new Error('socket hang up') });

      expect(entries[0]?.meta?.['error']).toEqual({
        name: 'Error',
        message: 'socket hang up',
        stack: expect.any(String),
      });
    });

    it('never logs script payloads or secrets', () => {
      createLogger('client').info('sending', {
        payload: 'import bpy',
        code: 'import bpy',
        script: 'scene.py',
        password: 'test-secret',
        secret: 'test-secret',
        token: 'test-token',
        byteLength: 10,
      });

      expect(entries[0]?.meta).toEqual({ byteLength: 10 });
    });

    it('omits meta when every field is denied', () => {
      createLogger('client').info('sending', { code: 'x' });
      expect(entries[0]?.meta).toBeUndefined();
    });

    it('lists the denied fields', () => {
      expect([...NEVER_LOG_FIELDS].sort()).toEqual([
        'code',
        'password',
        'payload',
        'script',
        'secret',
        'token',
      ]);
    });

    it('truncates long strings', () => {
      createLogger('client').warn('bad reply', { preview: 'x'.repeat(2_000) });
      expect(entries[0]?.meta?.['preview']).toBe(
        'x'.repeat(META_STRING_MAX_LENGTH) + '...[truncated]',
      );
    });

    it('keeps strings at the limit', () => {
      const exact = 'y'.repeat(META_STRING_MAX_LENGTH);
      createLogger('client').warn('reply', { preview: exact });
      expect(entries[0]?.meta?.['preview']).toBe(exact);
    });
  });
});
