export { PipelineOrchestrator } from './orchestrator.js';
export type {
  PipelineStage,
  StageReport,
  PipelineResult,
  PipelineSuccess,
  PipelineFailure,
  PipelineRunOptions,
} from './types.js';
