export type {
  PipelineState,
  TransitionListener,
  StageEntry,
  HaltInfo,
  PipelineResult,
  RunRecorder,
  PreflightResult,
  RunOptions,
} from './types.js';

export { defineStage, stagesFromConfig, resolveCommand } from './stage.js';
export type { Stage, StageInput, StageSource } from './stage.js';
export { Orchestrator, SETUP_STEPS } from './orchestrator.js';
export type { HostProbe, StageRunner, OrchestratorOptions } from './orchestrator.js';
