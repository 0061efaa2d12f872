import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  applyEnvOverrides,
  loadConfig,
  resolveConfigPath,
  withBaseTimeout,
} from './config-loader.js';
import { ConfigError, DEFAULT_CONFIG } from '../types/config.js';
import { createStageConfig, createTestConfig } from '../testing/factories.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

describe('loadConfig', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'scriptrelay-config-'));
    path = join(dir, 'relay.toml');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(toml: string): void {
    writeFileSync(path, toml, 'utf-8');
  }

  it('returns the defaults when relay.toml does not exist', () => {
    expect(loadConfig(path)).toEqual(DEFAULT_CONFIG);
  });

  it('returns the defaults for an empty file', () => {
    write('\n   \n');
    expect(loadConfig(path)).toEqual(DEFAULT_CONFIG);
  });

  it('returns a copy the caller may modify', () => {
    const config = loadConfig(path);
    config.host.port = 1;
    expect(DEFAULT_CONFIG.host.port).toBe(9876);
  });

  it('parses every section', () => {
    write(`
[host]
address = "10.0.0.5"
port = 9999
connect_timeout_ms = 2000

[retry]
max_attempts = 5
base_timeout_ms = 10000
timeout_multiplier = 2.0
debug = true

[logging]
level = "debug"

[journal]
enabled = false

[pipeline]
name = "castle"

[[stages]]
name = "clear"
label = "Scene Clearing"
script = "scripts/clear.py"

[[stages]]
name = "walls"
code = "build_walls()"
attempts = 2
timeout_ms = 45000
retry_on_application_error = true
`);

    const config = loadConfig(path);

    expect(config.host).toEqual({
      address: '10.0.0.5',
      port: 9999,
      connect_timeout_ms: 2_000,
      max_response_bytes: DEFAULT_CONFIG.host.max_response_bytes,
    });
    expect(config.retry).toEqual({
      ...DEFAULT_CONFIG.retry,
      max_attempts: 5,
      base_timeout_ms: 10_000,
      timeout_multiplier: 2,
      debug: true,
    });
    expect(config.logging.level).toBe('debug');
    expect(config.journal).toEqual({ enabled: false, path: DEFAULT_CONFIG.journal.path });
    expect(config.pipeline.name).toBe('castle');
    expect(config.stages).toEqual([
      {
        name: 'clear',
        label: 'Scene Clearing',
        script: 'scripts/clear.py',
        send_as: 'code',
        retry_on_application_error: false,
      },
      {
        name: 'walls',
        label: 'walls',
        code: 'build_walls()',
        send_as: 'code',
        attempts: 2,
        timeout_ms: 45_000,
        retry_on_application_error: true,
      },
    ]);
  });

  it('drops disabled stages', () => {
    write(`
[[stages]]
name = "a"
code = "pass"

[[stages]]
name = "b"
code = "pass"
enabled = false
`);
    expect(loadConfig(path).stages.map((s) => s.name)).toEqual(['a']);
  });

  it('rejects TOML syntax errors', () => {
    write('[host\nport = 1\n');
    expect(() => loadConfig(path)).toThrow(ConfigError);
    expect(() => loadConfig(path)).toThrow(`Invalid TOML in ${path}:`);
  });

  it('rejects unknown keys', () => {
    write('[host]\nadress = "typo"\n');
    expect(() => loadConfig(path)).toThrow(
      `Invalid configuration in ${path}:\n  /host: unknown key "adress"`,
    );
  });

  it('rejects unknown top-level sections', () => {
    write('[server]\nport = 1\n');
    expect(() => loadConfig(path)).toThrow(
      `Invalid configuration in ${path}:\n  /: unknown key "server"`,
    );
  });

  it('rejects an out-of-range port', () => {
    write('[host]\nport = 70000\n');
    expect(() => loadConfig(path)).toThrow('/host/port: must be <= 65535');
  });

  it('rejects a stage without a name', () => {
    write('[[stages]]\ncode = "pass"\n');
    expect(() => loadConfig(path)).toThrow("/stages/0: must have required property 'name'");
  });

  it('rejects a stage with both script and code', () => {
    write('[[stages]]\nname = "both"\nscript = "a.py"\ncode = "pass"\n');
    expect(() => loadConfig(path)).toThrow('Stage "both" must set exactly one of "script" or "code"');
  });

  it('rejects duplicate stage names', () => {
    write('[[stages]]\nname = "a"\ncode = "1"\n\n[[stages]]\nname = "a"\ncode = "2"\n');
    expect(() => loadConfig(path)).toThrow('Duplicate stage name: "a"');
  });
});

// ---------------------------------------------------------------------------
// resolveConfigPath()
// ---------------------------------------------------------------------------

describe('resolveConfigPath', () => {
  it('defaults to relay.toml in the working directory', () => {
    expect(resolveConfigPath({}, '/work')).toBe('/work/relay.toml');
  });

  it('honours SCRIPTRELAY_CONFIG relative to the working directory', () => {
    expect(resolveConfigPath({ SCRIPTRELAY_CONFIG: 'conf/castle.toml' }, '/work')).toBe(
      '/work/conf/castle.toml',
    );
  });

  it('keeps an absolute SCRIPTRELAY_CONFIG', () => {
    expect(resolveConfigPath({ SCRIPTRELAY_CONFIG: '/etc/relay.toml' }, '/work')).toBe(
      '/etc/relay.toml',
    );
  });

  it('ignores an empty SCRIPTRELAY_CONFIG', () => {
    expect(resolveConfigPath({ SCRIPTRELAY_CONFIG: '' }, '/work')).toBe('/work/relay.toml');
  });
});

// ---------------------------------------------------------------------------
// applyEnvOverrides()
// ---------------------------------------------------------------------------

describe('applyEnvOverrides', () => {
  it('returns an equal copy when no variables are set', () => {
    const config = createTestConfig();
    const result = applyEnvOverrides(config, {});
    expect(result).toEqual(config);
    expect(result).not.toBe(config);
  });

  it('overrides host and port', () => {
    const result = applyEnvOverrides(createTestConfig(), {
      SCRIPTRELAY_HOST: 'render-box',
      SCRIPTRELAY_PORT: '9000',
    });
    expect(result.host.address).toBe('render-box');
    expect(result.host.port).toBe(9000);
  });

  it('rejects a malformed port', () => {
    expect(() => applyEnvOverrides(createTestConfig(), { SCRIPTRELAY_PORT: 'abc' })).toThrow(
      'SCRIPTRELAY_PORT must be a positive integer, got "abc"',
    );
    expect(() => applyEnvOverrides(createTestConfig(), { SCRIPTRELAY_PORT: '70000' })).toThrow(
      'SCRIPTRELAY_PORT must be between 1 and 65535, got 70000',
    );
  });

  it('reads SCRIPTRELAY_DEBUG as a boolean', () => {
    expect(applyEnvOverrides(createTestConfig(), { SCRIPTRELAY_DEBUG: '1' }).retry.debug).toBe(true);
    expect(applyEnvOverrides(createTestConfig(), { SCRIPTRELAY_DEBUG: 'TRUE' }).retry.debug).toBe(
      true,
    );
    expect(
      applyEnvOverrides(createTestConfig({ retry: { debug: true } }), { SCRIPTRELAY_DEBUG: '0' })
        .retry.debug,
    ).toBe(false);
  });

  it('applies SCRIPTRELAY_TIMEOUT_MS to the base and every stage', () => {
    const config = createTestConfig({
      stages: [createStageConfig({ name: 'a', timeout_ms: 90_000 }), createStageConfig({ name: 'b' })],
    });
    const result = applyEnvOverrides(config, { SCRIPTRELAY_TIMEOUT_MS: '2500' });

    expect(result.retry.base_timeout_ms).toBe(2_500);
    expect(result.stages.map((s) => s.timeout_ms)).toEqual([2_500, 2_500]);
    expect(config.stages[0]?.timeout_ms).toBe(90_000);
  });

  it('validates SCRIPTRELAY_LOG_LEVEL', () => {
    expect(applyEnvOverrides(createTestConfig(), { SCRIPTRELAY_LOG_LEVEL: 'warn' }).logging.level).toBe(
      'warn',
    );
    expect(() => applyEnvOverrides(createTestConfig(), { SCRIPTRELAY_LOG_LEVEL: 'loud' })).toThrow(
      'SCRIPTRELAY_LOG_LEVEL must be one of debug, info, warn, error',
    );
  });
});

// ---------------------------------------------------------------------------
// withBaseTimeout()
// ---------------------------------------------------------------------------

describe('withBaseTimeout', () => {
  it('sets the base timeout and every stage timeout without touching the input', () => {
    const config = createTestConfig({ stages: [createStageConfig({ name: 'a' })] });
    const result = withBaseTimeout(config, 1_000);

    expect(result.retry.base_timeout_ms).toBe(1_000);
    expect(result.stages[0]?.timeout_ms).toBe(1_000);
    expect(config.retry.base_timeout_ms).toBe(30_000);
    expect(config.stages[0]?.timeout_ms).toBeUndefined();
  });
});
