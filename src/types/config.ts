/**
 * scriptrelay configuration schema.
 *
 * Defines the TypeScript types for `relay.toml` sections, the defaults
 * applied to absent sections, and `parseConfig()`, which turns a raw
 * (already schema-checked) object into a fully typed `RelayConfig`.
 */

import type { LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[host]` section: where the execution host listens. */
export interface HostConfig {
  address: string;
  port: number;
  connect_timeout_ms: number;
  max_response_bytes: number;
}

/** `[retry]` section: defaults for every Command's retry policy. */
export interface RetryConfig {
  max_attempts: number;
  base_timeout_ms: number;
  max_timeout_ms: number;
  timeout_multiplier: number;
  initial_backoff_ms: number;
  max_backoff_ms: number;
  debug: boolean;
}

/** `[logging]` section. */
export interface LoggingConfig {
  level: LogLevel;
}

/** `[journal]` section: SQLite run history used by `resume`. */
export interface JournalConfig {
  enabled: boolean;
  path: string;
}

/** `[pipeline]` section. */
export interface PipelineSection {
  name: string;
}

/** Where a stage takes its payload from. Exactly one of script/code is set. */
export type SendAs = 'code' | 'path';

/** One `[[stages]]` entry. */
export interface StageConfig {
  name: string;
  label: string;
  /** Script file, relative to the config file's directory. */
  script?: string;
  /** Inline script text. */
  code?: string;
  send_as: SendAs;
  attempts?: number;
  timeout_ms?: number;
  retry_on_application_error: boolean;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

export interface RelayConfig {
  host: HostConfig;
  retry: RetryConfig;
  logging: LoggingConfig;
  journal: JournalConfig;
  pipeline: PipelineSection;
  stages: StageConfig[];
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_HOST = 'localhost';
export const DEFAULT_PORT = 9876;

/** Default configuration applied when relay.toml is absent or partial. */
export const DEFAULT_CONFIG: RelayConfig = {
  host: {
    address: DEFAULT_HOST,
    port: DEFAULT_PORT,
    connect_timeout_ms: 5_000,
    max_response_bytes: 16 * 1024 * 1024,
  },
  retry: {
    max_attempts: 3,
    base_timeout_ms: 30_000,
    max_timeout_ms: 120_000,
    timeout_multiplier: 1.5,
    initial_backoff_ms: 500,
    max_backoff_ms: 8_000,
    debug: false,
  },
  logging: { level: 'info' },
  journal: { enabled: true, path: '.scriptrelay/journal.sqlite' },
  pipeline: { name: 'default' },
  stages: [],
};

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

/** Raised for configuration that parses but cannot be used. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** True for a plain TOML table (not an array or null). */
export function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined) return {};
  if (!isTable(value)) {
    throw new ConfigError(`[${key}] must be a table`);
  }
  return value;
}

function positiveInt(value: unknown, fallback: number, label: string): number {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${label} must be a positive integer`);
  }
  return value;
}

function optionalString(value: unknown, label: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`${label} must be a string`);
  }
  return value;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseStage(raw: unknown, index: number, retry: RetryConfig): StageConfig | null {
  if (!isTable(raw)) {
    throw new ConfigError(`stages[${index}] must be a table`);
  }
  const where = `stages[${index}]`;

  const name = optionalString(raw['name'], `${where}.name`);
  if (!name || name.trim().length === 0) {
    throw new ConfigError(`${where}.name is required`);
  }

  if (raw['enabled'] === false) {
    return null;
  }

  const script = optionalString(raw['script'], `${where}.script`);
  const code = optionalString(raw['code'], `${where}.code`);
  if ((script === undefined) === (code === undefined)) {
    throw new ConfigError(`Stage "${name}" must set exactly one of "script" or "code"`);
  }

  const sendAs = raw['send_as'] ?? 'code';
  if (sendAs !== 'code' && sendAs !== 'path') {
    throw new ConfigError(`Stage "${name}": send_as must be "code" or "path"`);
  }
  if (sendAs === 'path' && script === undefined) {
    throw new ConfigError(`Stage "${name}": send_as = "path" requires "script"`);
  }

  const stage: StageConfig = {
    name,
    label: optionalString(raw['label'], `${where}.label`) ?? name,
    send_as: sendAs,
    retry_on_application_error: raw['retry_on_application_error'] === true,
  };
  if (script !== undefined) stage.script = script;
  if (code !== undefined) stage.code = code;
  if (raw['attempts'] !== undefined) {
    stage.attempts = positiveInt(raw['attempts'], retry.max_attempts, `${where}.attempts`);
  }
  if (raw['timeout_ms'] !== undefined) {
    stage.timeout_ms = positiveInt(raw['timeout_ms'], retry.base_timeout_ms, `${where}.timeout_ms`);
  }
  return stage;
}

/**
 * Normalise a raw config object (e.g. from TOML parsing) into a fully
 * typed `RelayConfig`. Applies defaults for missing sections and checks
 * the cross-field rules a JSON Schema cannot express. Stages with
 * `enabled = false` are dropped here, so the orchestrator never sees them.
 */
export function parseConfig(raw: Record<string, unknown>): RelayConfig {
  // --- host ---
  const rawHost = section(raw, 'host');
  const address = optionalString(rawHost['address'], 'host.address') ?? DEFAULT_CONFIG.host.address;
  const port = positiveInt(rawHost['port'], DEFAULT_CONFIG.host.port, 'host.port');
  if (port > 65535) {
    throw new ConfigError('host.port must be an integer between 1 and 65535');
  }
  const host: HostConfig = {
    address,
    port,
    connect_timeout_ms: positiveInt(
      rawHost['connect_timeout_ms'],
      DEFAULT_CONFIG.host.connect_timeout_ms,
      'host.connect_timeout_ms',
    ),
    max_response_bytes: positiveInt(
      rawHost['max_response_bytes'],
      DEFAULT_CONFIG.host.max_response_bytes,
      'host.max_response_bytes',
    ),
  };

  // --- retry ---
  const rawRetry = section(raw, 'retry');
  const defaults = DEFAULT_CONFIG.retry;
  const multiplier = rawRetry['timeout_multiplier'] ?? defaults.timeout_multiplier;
  if (typeof multiplier !== 'number' || multiplier <= 1) {
    throw new ConfigError('retry.timeout_multiplier must be a number greater than 1');
  }
  const retry: RetryConfig = {
    max_attempts: positiveInt(rawRetry['max_attempts'], defaults.max_attempts, 'retry.max_attempts'),
    base_timeout_ms: positiveInt(
      rawRetry['base_timeout_ms'],
      defaults.base_timeout_ms,
      'retry.base_timeout_ms',
    ),
    max_timeout_ms: positiveInt(
      rawRetry['max_timeout_ms'],
      defaults.max_timeout_ms,
      'retry.max_timeout_ms',
    ),
    timeout_multiplier: multiplier,
    initial_backoff_ms: positiveInt(
      rawRetry['initial_backoff_ms'],
      defaults.initial_backoff_ms,
      'retry.initial_backoff_ms',
    ),
    max_backoff_ms: positiveInt(
      rawRetry['max_backoff_ms'],
      defaults.max_backoff_ms,
      'retry.max_backoff_ms',
    ),
    debug: rawRetry['debug'] === true,
  };

  // --- logging ---
  const rawLogging = section(raw, 'logging');
  const level = rawLogging['level'] ?? DEFAULT_CONFIG.logging.level;
  if (!isLogLevel(level)) {
    throw new ConfigError(
      `Invalid logging.level: "${String(level)}". Must be one of: ${LOG_LEVELS.join(', ')}`,
    );
  }
  const logging: LoggingConfig = { level };

  // --- journal ---
  const rawJournal = section(raw, 'journal');
  const journal: JournalConfig = {
    enabled: rawJournal['enabled'] !== false,
    path: optionalString(rawJournal['path'], 'journal.path') ?? DEFAULT_CONFIG.journal.path,
  };

  // --- pipeline ---
  const rawPipeline = section(raw, 'pipeline');
  const pipeline: PipelineSection = {
    name: optionalString(rawPipeline['name'], 'pipeline.name') ?? DEFAULT_CONFIG.pipeline.name,
  };

  // --- stages ---
  const rawStages = raw['stages'] ?? [];
  if (!Array.isArray(rawStages)) {
    throw new ConfigError('stages must be an array of tables');
  }
  const stages: StageConfig[] = [];
  const seen = new Set<string>();
  rawStages.forEach((entry: unknown, index: number) => {
    const stage = parseStage(entry, index, retry);
    if (!stage) return;
    if (seen.has(stage.name)) {
      throw new ConfigError(`Duplicate stage name: "${stage.name}"`);
    }
    seen.add(stage.name);
    stages.push(stage);
  });

  return { host, retry, logging, journal, pipeline, stages };
}
