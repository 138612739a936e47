/**
 * agent-relay library entry.
 *
 * ```typescript
 * import { RelayClient, PipelineOrchestrator } from 'agent-relay';
 *
 * const research = new RelayClient({ baseUrl: 'http://localhost:8003', name: 'research' });
 * const content = new RelayClient({ baseUrl: 'http://localhost:8004', name: 'content' });
 * const result = await new PipelineOrchestrator().run(
 *   [{ name: 'research', client: research }, { name: 'content', client: content }],
 *   'Solid state batteries'
 * );
 * ```
 */

export * from './envelope/index.js';
export * from './transport/index.js';
export * from './pipeline/index.js';
export * from './agent/index.js';
export * from './agents/index.js';
export {
  loadConfig,
  resolveConfig,
  resolveAgentTarget,
  type AgentTarget,
  type LoadConfigOptions,
  type RelayConfig,
  type LlmConfig,
} from './config/index.js';
export * from './utils/errors.js';
export {
  AppError,
  ErrorCategory,
  ErrorSeverity,
  classifyError,
  isRetryable,
  handleError,
} from './utils/error-handler.js';
export { initLogger, createLogger, type LoggerConfig, type LogLevel } from './utils/logger.js';
