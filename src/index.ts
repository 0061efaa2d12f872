/**
 * Public API for embedding scriptrelay.
 */

export const VERSION = '0.1.0';

export * from './types/index.js';

export {
  createLogger,
  configureLogging,
  resetLogging,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './core/logger.js';
export { RelayError, isRelayError, toRelayError } from './core/relay-error.js';
export { loadConfig, applyEnvOverrides, withBaseTimeout, resolveConfigPath } from './core/config-loader.js';

export { FrameReader } from './ipc/frame-reader.js';
export { createCommand, encode, decode, assertEncodable, type CommandInput } from './ipc/codec.js';
export { TcpTransport, type TcpTransportOptions } from './ipc/transport.js';
export {
  ExecutionClient,
  type ExecutionClientOptions,
  type ProbeResult,
} from './ipc/execution-client.js';

export {
  RetryPolicy,
  scaleForDebug,
  attemptTimeout,
  pauseAfter,
  DEFAULT_BACKOFF,
  type CommandExecutor,
  type Outcome,
  type AttemptRecord,
  type RetryPolicyOptions,
} from './core/retry-policy.js';
export { FileScriptSource, type ScriptSource } from './core/script-source.js';
export { RunJournal, type JournalRun, type JournalEntry } from './core/run-journal.js';
export * from './core/pipeline/index.js';
export { createRuntime, type RelayRuntime, type RuntimeOptions } from './relay-runtime.js';
