/**
 * Pipeline types for the ordered, fail-fast stage runner.
 *
 * A run walks the Stage list in order. Each stage either succeeds (the
 * run moves on) or fails after its retry budget (the run halts there and
 * no later stage is attempted).
 */

import type { ErrorKindValue, ErrorPayload } from '../../types/errors.js';

// ---------------------------------------------------------------------------
// State machine
// ---------------------------------------------------------------------------

/**
 * Orchestrator state. `index` is the 0-based position in the Stage list.
 *
 *   pending -> running(0) -> running(1) -> ... -> succeeded
 *                  \-> failed(i)   (terminal)
 */
export type PipelineState =
  | { phase: 'pending' }
  | { phase: 'running'; index: number; stage: string }
  | { phase: 'succeeded' }
  | { phase: 'failed'; index: number; stage: string };

export type TransitionListener = (next: PipelineState, previous: PipelineState) => void;

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

/** One stage as it finished in a run. */
export type StageEntry =
  | { stage: string; outcome: 'success'; attempts: number; durationMs: number; result?: string }
  | { stage: string; outcome: 'failed'; attempts: number; durationMs: number; error: ErrorPayload };

/** Where and why a run stopped early. `index` is 1-based. */
export interface HaltInfo {
  stage: string;
  index: number;
  kind: ErrorKindValue;
  message: string;
}

export interface PipelineResult {
  pipeline: string;
  status: 'succeeded' | 'failed';
  /** One entry per stage attempted, in order. Ends at the halting stage. */
  entries: StageEntry[];
  haltedAt?: HaltInfo;
  totalAttempts: number;
  /** 1-based index of the first stage this run executed. */
  startIndex: number;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/** Receives every finished run. Implemented by the run journal. */
export interface RunRecorder {
  recordRun(result: PipelineResult, startedAt: Date): void;
}

export interface PreflightResult {
  ok: boolean;
  message: string;
  latencyMs: number;
}

export interface RunOptions {
  debug?: boolean;
  /** Stage name or 1-based index to start from. Defaults to the first stage. */
  fromStage?: string | number;
}
