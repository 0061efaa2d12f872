/**
 * TOML-based configuration loader for scriptrelay.
 *
 * Reads `relay.toml`, parses it with smol-toml, checks it against the
 * JSON Schema with ajv, and normalises it with `parseConfig()`.
 * Environment overrides are applied as a separate, explicit step so the
 * resolved `RelayConfig` is a plain value handed to constructors.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import _Ajv, { type ErrorObject } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import { ConfigError, DEFAULT_CONFIG, isLogLevel, parseConfig } from '../types/config.js';
import type { RelayConfig } from '../types/config.js';
import { RELAY_CONFIG_SCHEMA } from '../types/config-schema.js';

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export const CONFIG_ENV = {
  CONFIG: 'SCRIPTRELAY_CONFIG',
  HOST: 'SCRIPTRELAY_HOST',
  PORT: 'SCRIPTRELAY_PORT',
  DEBUG: 'SCRIPTRELAY_DEBUG',
  TIMEOUT_MS: 'SCRIPTRELAY_TIMEOUT_MS',
  LOG_LEVEL: 'SCRIPTRELAY_LOG_LEVEL',
} as const;

export const DEFAULT_CONFIG_FILE = 'relay.toml';

type Env = Readonly<Record<string, string | undefined>>;

/** Config file path: `$SCRIPTRELAY_CONFIG`, else `relay.toml` in `cwd`. */
export function resolveConfigPath(env: Env, cwd: string): string {
  const fromEnv = env[CONFIG_ENV.CONFIG];
  return resolve(cwd, fromEnv && fromEnv.length > 0 ? fromEnv : DEFAULT_CONFIG_FILE);
}

// ---------------------------------------------------------------------------
// Schema check
// ---------------------------------------------------------------------------

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSchema = ajv.compile<Record<string, unknown>>(RELAY_CONFIG_SCHEMA);

function formatSchemaError(error: ErrorObject): string {
  const where = error.instancePath.length > 0 ? error.instancePath : '/';
  if (error.keyword === 'additionalProperties') {
    const extra: unknown = error.params['additionalProperty'];
    return `${where}: unknown key "${String(extra)}"`;
  }
  return `${where}: ${error.message ?? 'is invalid'}`;
}

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

function cloneDefaults(): RelayConfig {
  return structuredClone(DEFAULT_CONFIG);
}

/**
 * Load and validate a `relay.toml` file.
 *
 * A missing or empty file yields the defaults (no stages).
 *
 * @throws ConfigError on TOML syntax errors, schema violations, or
 *   cross-field errors such as duplicate stage names.
 */
export function loadConfig(path: string): RelayConfig {
  if (!existsSync(path)) {
    return cloneDefaults();
  }

  const content = readFileSync(path, 'utf-8');
  if (content.trim().length === 0) {
    return cloneDefaults();
  }

  let raw: Record<string, unknown>;
  try {
    raw = parseTOML(content);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid TOML in ${path}: ${detail}`);
  }

  if (!validateSchema(raw)) {
    const problems = (validateSchema.errors ?? []).map(formatSchemaError);
    throw new ConfigError(`Invalid configuration in ${path}:\n  ${problems.join('\n  ')}`);
  }

  return parseConfig(raw);
}

// ---------------------------------------------------------------------------
// applyEnvOverrides()
// ---------------------------------------------------------------------------

function envInt(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim().length === 0) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(`${key} must be a positive integer, got "${value}"`);
  }
  const n = Number(value.trim());
  if (n < 1) {
    throw new ConfigError(`${key} must be a positive integer, got "${value}"`);
  }
  return n;
}

/**
 * Return a copy of `config` with environment overrides applied.
 *
 * `SCRIPTRELAY_TIMEOUT_MS` replaces the base timeout for every stage,
 * including stages that set their own `timeout_ms`. `SCRIPTRELAY_CONFIG`
 * is read by `resolveConfigPath()`, not here.
 *
 * @throws ConfigError for malformed values.
 */
export function applyEnvOverrides(config: RelayConfig, env: Env): RelayConfig {
  const next = structuredClone(config);

  const host = env[CONFIG_ENV.HOST];
  if (host !== undefined && host.length > 0) {
    next.host.address = host;
  }

  const port = envInt(env, CONFIG_ENV.PORT);
  if (port !== undefined) {
    if (port > 65535) {
      throw new ConfigError(`${CONFIG_ENV.PORT} must be between 1 and 65535, got ${port}`);
    }
    next.host.port = port;
  }

  const debug = env[CONFIG_ENV.DEBUG];
  if (debug !== undefined && debug.length > 0) {
    next.retry.debug = debug === '1' || debug.toLowerCase() === 'true';
  }

  const timeout = envInt(env, CONFIG_ENV.TIMEOUT_MS);
  if (timeout !== undefined) {
    setBaseTimeout(next, timeout);
  }

  const level = env[CONFIG_ENV.LOG_LEVEL];
  if (level !== undefined && level.length > 0) {
    if (!isLogLevel(level)) {
      throw new ConfigError(`${CONFIG_ENV.LOG_LEVEL} must be one of debug, info, warn, error`);
    }
    next.logging.level = level;
  }

  return next;
}

/** Copy of `config` whose base timeout, and every stage's, is `timeoutMs`. */
export function withBaseTimeout(config: RelayConfig, timeoutMs: number): RelayConfig {
  const next = structuredClone(config);
  setBaseTimeout(next, timeoutMs);
  return next;
}

function setBaseTimeout(config: RelayConfig, timeoutMs: number): void {
  config.retry.base_timeout_ms = timeoutMs;
  for (const stage of config.stages) {
    stage.timeout_ms = timeoutMs;
  }
}
