/**
 * Service wiring for one CLI invocation.
 *
 * Builds the transport, execution client, retry policy, script source,
 * run journal and orchestrator from a resolved `RelayConfig`. Everything
 * the services need is passed in here; nothing is read from module state.
 */

import { isAbsolute, resolve } from 'node:path';
import type { RelayConfig } from './types/config.js';
import { TcpTransport } from './ipc/transport.js';
import { ExecutionClient } from './ipc/execution-client.js';
import { RetryPolicy } from './core/retry-policy.js';
import { FileScriptSource, type ScriptSource } from './core/script-source.js';
import { RunJournal } from './core/run-journal.js';
import { Orchestrator } from './core/pipeline/orchestrator.js';
import { stagesFromConfig } from './core/pipeline/stage.js';

export interface RelayRuntime {
  config: RelayConfig;
  client: ExecutionClient;
  policy: RetryPolicy;
  scripts: ScriptSource;
  orchestrator: Orchestrator;
  journal: RunJournal | null;
  /** Release the journal database. Safe to call multiple times. */
  close(): void;
}

export interface RuntimeOptions {
  /** Directory that relative script and journal paths resolve against. */
  baseDir: string;
  /** Keep the journal in memory. */
  memoryJournal?: boolean;
  /** Injectable retry pause for tests. */
  sleep?: (ms: number) => Promise<void>;
}

export function createRuntime(config: RelayConfig, options: RuntimeOptions): RelayRuntime {
  const transport = new TcpTransport(
    { host: config.host.address, port: config.host.port },
    {
      connectTimeoutMs: config.host.connect_timeout_ms,
      maxResponseBytes: config.host.max_response_bytes,
    },
  );
  const client = new ExecutionClient(transport);
  const policy = new RetryPolicy(client, {
    timeoutMultiplier: config.retry.timeout_multiplier,
    maxTimeoutMs: config.retry.max_timeout_ms,
    initialBackoffMs: config.retry.initial_backoff_ms,
    maxBackoffMs: config.retry.max_backoff_ms,
    ...(options.sleep ? { sleep: options.sleep } : {}),
  });
  const scripts = new FileScriptSource(options.baseDir);

  let journal: RunJournal | null = null;
  if (config.journal.enabled) {
    const path = isAbsolute(config.journal.path)
      ? config.journal.path
      : resolve(options.baseDir, config.journal.path);
    journal = new RunJournal({ path, useMemory: options.memoryJournal ?? false });
  }

  const orchestrator = new Orchestrator({
    name: config.pipeline.name,
    stages: stagesFromConfig(config),
    host: client,
    runner: policy,
    scripts,
    preflightTimeoutMs: config.host.connect_timeout_ms,
    ...(journal ? { journal } : {}),
  });

  return {
    config,
    client,
    policy,
    scripts,
    orchestrator,
    journal,
    close: () => journal?.close(),
  };
}
