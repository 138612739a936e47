/**
 * Agent hosting module.
 */

export { AgentServer, buildStatusEnvelope, formatStatusFrame, type AgentServerConfig } from './agent-server.js';
export {
  resolveMessagePart,
  resolveMessageParts,
  extractInboundText,
  partText,
  type MessagePart,
  type TextPart,
  type ContentPart,
  type UnknownPart,
} from './message-parts.js';
export type { AgentWorkflow, RunContext, TaskState } from './types.js';
