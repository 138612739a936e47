/**
 * PipelineOrchestrator - chains agents so each stage's output feeds the next.
 *
 * ```
 * input ──► stage 1 ──► recover? ──► stage 2 ──► output
 *              │                        │
 *              └── failure ─────────────┴──► PipelineFailure (stage index + name)
 * ```
 *
 * Stages run strictly in order. The first failure ends the run; later
 * stages are never invoked. There are no retries and no alternate agents.
 * Relayed envelopes are unwrapped only between stages; the last stage's
 * output is returned as is.
 */

import type { Logger } from 'pino';
import { createLogger } from '../utils/logger.js';
import { PipelineStageError, ValidationError, formatError } from '../utils/errors.js';
import { containsStatusEnvelopes, recoverEnvelopeText } from '../envelope/splitter.js';
import { ExtractionStats } from '../envelope/stats.js';
import type { PipelineResult, PipelineRunOptions, PipelineStage, StageReport } from './types.js';

export class PipelineOrchestrator {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('PipelineOrchestrator');
  }

  /**
   * Run every stage in order, starting from `initialInput`.
   *
   * Never rejects for stage failures; those come back as a
   * `{ success: false }` result.
   *
   * @throws ValidationError when `stages` is empty
   */
  async run(stages: readonly PipelineStage[], initialInput: string, options: PipelineRunOptions = {}): Promise<PipelineResult> {
    if (stages.length === 0) {
      throw new ValidationError('Pipeline needs at least one stage', { field: 'stages', value: stages });
    }

    const reports: StageReport[] = [];
    let current = initialInput;

    this.logger.info({ stages: stages.map((stage) => stage.name), inputLength: initialInput.length }, 'Pipeline started');

    for (const [index, stage] of stages.entries()) {
      const startedAt = Date.now();
      this.logger.info({ stage: stage.name, index, inputLength: current.length }, 'Stage started');

      let output: string;
      try {
        output = await stage.client.invoke(current, { signal: options.signal });
      } catch (error) {
        const stageError = new PipelineStageError(index, stage.name, error);
        reports.push({
          index,
          name: stage.name,
          inputLength: current.length,
          durationMs: Date.now() - startedAt,
          recovered: false,
        });
        this.logger.error({ stage: stage.name, index, err: error }, `Pipeline aborted: ${formatError(error)}`);
        return {
          success: false,
          output: undefined,
          failedStage: { index, name: stage.name },
          error: stageError,
          stages: reports,
        };
      }

      const hasNextStage = index < stages.length - 1;
      const recovered = hasNextStage && containsStatusEnvelopes(output);
      if (recovered) {
        const stats = new ExtractionStats();
        output = recoverEnvelopeText(output, stats);
        this.logger.debug({ stage: stage.name, ...stats.snapshot() }, 'Unwrapped relayed envelopes');
      }

      reports.push({
        index,
        name: stage.name,
        inputLength: current.length,
        outputLength: output.length,
        durationMs: Date.now() - startedAt,
        recovered,
      });
      this.logger.info({ stage: stage.name, index, outputLength: output.length }, 'Stage complete');

      current = output;
    }

    this.logger.info({ outputLength: current.length }, 'Pipeline complete');
    return { success: true, output: current, stages: reports };
  }
}
