/**
 * Pipeline types.
 */

import type { TextInvoker } from '../transport/types.js';
import type { PipelineStageError } from '../utils/errors.js';

/**
 * One stage of a pipeline: a named text producer.
 */
export interface PipelineStage {
  name: string;
  client: TextInvoker;
}

/**
 * What happened in a single stage.
 */
export interface StageReport {
  index: number;
  name: string;
  inputLength: number;
  /** Undefined when the stage failed */
  outputLength?: number;
  durationMs: number;
  /** Whether relayed envelopes were unwrapped from the stage output */
  recovered: boolean;
}

export interface PipelineSuccess {
  success: true;
  output: string;
  stages: StageReport[];
}

export interface PipelineFailure {
  success: false;
  output: undefined;
  failedStage: { index: number; name: string };
  error: PipelineStageError;
  stages: StageReport[];
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

export interface PipelineRunOptions {
  /** Forwarded to every stage invocation */
  signal?: AbortSignal;
}
