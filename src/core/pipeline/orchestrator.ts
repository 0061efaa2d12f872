/**
 * Pipeline orchestrator.
 *
 * Runs an ordered Stage list through the retry policy, strictly one stage
 * at a time, and halts on the first stage that fails. Later stages depend
 * on host state produced by earlier ones, so there is no partial
 * continuation: a failed run is resumed by starting a new run at the
 * halting stage (`fromStage`).
 */

import type { Command } from '../../types/protocol.js';
import { ErrorKind } from '../../types/errors.js';
import { RelayError, toRelayError } from '../relay-error.js';
import { createLogger, type Logger } from '../logger.js';
import type { Outcome, RunOptions as PolicyRunOptions } from '../retry-policy.js';
import type { ProbeResult } from '../../ipc/execution-client.js';
import type { ScriptSource } from '../script-source.js';
import { resolveCommand, type Stage } from './stage.js';
import type {
  PipelineResult,
  PipelineState,
  PreflightResult,
  RunOptions,
  RunRecorder,
  StageEntry,
  TransitionListener,
} from './types.js';

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/** Reachability check, satisfied by ExecutionClient. */
export interface HostProbe {
  readonly endpoint: string;
  probe(timeoutMs?: number): Promise<ProbeResult>;
}

/** Retried execution of one Command, satisfied by RetryPolicy. */
export interface StageRunner {
  run(command: Command, options: PolicyRunOptions): Promise<Outcome>;
}

export interface OrchestratorOptions {
  name: string;
  stages: readonly Stage[];
  host: HostProbe;
  runner: StageRunner;
  scripts: ScriptSource;
  journal?: RunRecorder;
  logger?: Logger;
  /** Bound on the preflight connect. Default 5000 ms. */
  preflightTimeoutMs?: number;
}

/** Printed when the host cannot be reached. */
export const SETUP_STEPS: readonly string[] = [
  'Open Blender',
  'Go to the 3D View sidebar (press N)',
  "Find the 'BlenderMCP' tab",
  "Click 'Connect to Claude'",
  'Run this command again',
];

const DEFAULT_PREFLIGHT_TIMEOUT_MS = 5_000;

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class Orchestrator {
  readonly name: string;
  readonly stages: readonly Stage[];
  private readonly host: HostProbe;
  private readonly runner: StageRunner;
  private readonly scripts: ScriptSource;
  private readonly journal: RunRecorder | undefined;
  private readonly logger: Logger;
  private readonly preflightTimeoutMs: number;
  private readonly listeners: TransitionListener[] = [];
  private current: PipelineState = { phase: 'pending' };
  private inProgress = false;

  constructor(options: OrchestratorOptions) {
    const seen = new Set<string>();
    for (const stage of options.stages) {
      if (seen.has(stage.name)) {
        throw new Error(`Duplicate stage name: "${stage.name}"`);
      }
      seen.add(stage.name);
    }

    this.name = options.name;
    this.stages = Object.freeze([...options.stages]);
    this.host = options.host;
    this.runner = options.runner;
    this.scripts = options.scripts;
    this.journal = options.journal;
    this.logger = (options.logger ?? createLogger('orchestrator')).withContext({
      pipeline: options.name,
    });
    this.preflightTimeoutMs = options.preflightTimeoutMs ?? DEFAULT_PREFLIGHT_TIMEOUT_MS;
  }

  get state(): PipelineState {
    return this.current;
  }

  /** Subscribe to state changes. Returns an unsubscribe function. */
  onTransition(listener: TransitionListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) this.listeners.splice(index, 1);
    };
  }

  /**
   * Check that the host accepts connections before any stage spends its
   * retry budget. Never throws.
   */
  async preflight(): Promise<PreflightResult> {
    const probe = await this.host.probe(this.preflightTimeoutMs);
    if (probe.reachable) {
      this.logger.info('host reachable', { endpoint: this.host.endpoint, duration_ms: probe.latencyMs });
      return {
        ok: true,
        message: `Connected to ${this.host.endpoint} in ${probe.latencyMs}ms`,
        latencyMs: probe.latencyMs,
      };
    }

    const reason = probe.error?.message ?? 'no connection';
    this.logger.warn('host unreachable', { endpoint: this.host.endpoint, error: reason });
    const steps = SETUP_STEPS.map((step, i) => `  ${i + 1}. ${step}`).join('\n');
    return {
      ok: false,
      message: `Cannot reach the host at ${this.host.endpoint}: ${reason}\n\nSetup:\n${steps}`,
      latencyMs: probe.latencyMs,
    };
  }

  /**
   * Execute the stages in order from `fromStage`, halting on the first
   * failure. Stage failures are reported in the result, not thrown.
   *
   * @throws RelayError(INVALID_COMMAND) if `fromStage` names no stage.
   * @throws Error if another run on this orchestrator is still in progress.
   */
  async run(options?: RunOptions): Promise<PipelineResult> {
    if (this.inProgress) {
      throw new Error(`Pipeline "${this.name}" is already running`);
    }
    const start = this.resolveStart(options?.fromStage);
    const debug = options?.debug ?? false;

    this.inProgress = true;
    this.current = { phase: 'pending' };
    const startedAt = new Date();
    const entries: StageEntry[] = [];
    let totalAttempts = 0;

    this.logger.info('pipeline started', {
      stages: this.stages.length,
      fromIndex: start + 1,
      debug,
    });

    try {
      for (let i = start; i < this.stages.length; i++) {
        const stage = this.stages[i];
        if (stage === undefined) break;
        this.transition({ phase: 'running', index: i, stage: stage.name });

        const entry = await this.runStage(stage, debug);
        entries.push(entry);
        totalAttempts += entry.attempts;

        if (entry.outcome === 'failed') {
          this.transition({ phase: 'failed', index: i, stage: stage.name });
          const error = entry.error;
          const result: PipelineResult = {
            pipeline: this.name,
            status: 'failed',
            entries,
            haltedAt: { stage: stage.name, index: i + 1, kind: error.kind, message: error.message },
            totalAttempts,
            startIndex: start + 1,
          };
          this.logger.error('pipeline halted', {
            stage: stage.name,
            error_kind: error.kind,
            error: error.message,
            attempts: totalAttempts,
          });
          this.record(result, startedAt);
          return result;
        }
      }

      this.transition({ phase: 'succeeded' });
      const result: PipelineResult = {
        pipeline: this.name,
        status: 'succeeded',
        entries,
        totalAttempts,
        startIndex: start + 1,
      };
      this.logger.info('pipeline succeeded', {
        attempts: totalAttempts,
        duration_ms: Date.now() - startedAt.getTime(),
      });
      this.record(result, startedAt);
      return result;
    } finally {
      this.inProgress = false;
    }
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async runStage(stage: Stage, debug: boolean): Promise<StageEntry> {
    const log = this.logger.withContext({ stage: stage.name });
    const startTime = Date.now();

    let command: Command;
    try {
      command = await resolveCommand(stage, this.scripts);
    } catch (err) {
      const error = toRelayError(err);
      log.error('stage could not be prepared', { error_kind: error.kind, error: error.message });
      return {
        stage: stage.name,
        outcome: 'failed',
        attempts: 0,
        durationMs: Date.now() - startTime,
        error: error.toErrorPayload(),
      };
    }

    log.info('stage started', { command: command.label, attempts: stage.attempts });
    const outcome = await this.runner.run(command, {
      attempts: stage.attempts,
      baseTimeoutMs: stage.timeoutMs,
      debug,
    });
    const durationMs = Date.now() - startTime;

    if (outcome.status === 'success') {
      log.info('stage succeeded', { attempt: outcome.attempts, duration_ms: durationMs });
      return {
        stage: stage.name,
        outcome: 'success',
        attempts: outcome.attempts,
        durationMs,
        ...(outcome.response.result !== undefined ? { result: outcome.response.result } : {}),
      };
    }

    log.warn('stage failed', {
      attempt: outcome.attempts,
      duration_ms: durationMs,
      error_kind: outcome.error.kind,
      error: outcome.error.message,
    });
    return {
      stage: stage.name,
      outcome: 'failed',
      attempts: outcome.attempts,
      durationMs,
      error: outcome.error,
    };
  }

  /** 0-based index of the first stage to run. */
  private resolveStart(fromStage: string | number | undefined): number {
    if (fromStage === undefined) return 0;

    if (typeof fromStage === 'string') {
      const byName = this.stages.findIndex((s) => s.name === fromStage);
      if (byName !== -1) return byName;
      if (!/^\d+$/.test(fromStage)) {
        throw new RelayError({
          kind: ErrorKind.INVALID_COMMAND,
          message: `Unknown stage "${fromStage}" in pipeline "${this.name}"`,
        });
      }
      return this.resolveStart(Number(fromStage));
    }

    if (!Number.isInteger(fromStage) || fromStage < 1 || fromStage > this.stages.length) {
      throw new RelayError({
        kind: ErrorKind.INVALID_COMMAND,
        message: `Stage index ${fromStage} is out of range 1..${this.stages.length}`,
      });
    }
    return fromStage - 1;
  }

  private transition(next: PipelineState): void {
    const previous = this.current;
    this.current = next;
    for (const listener of [...this.listeners]) {
      listener(next, previous);
    }
  }

  private record(result: PipelineResult, startedAt: Date): void {
    if (!this.journal) return;
    try {
      this.journal.recordRun(result, startedAt);
    } catch (err) {
      this.logger.warn('failed to record run', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
