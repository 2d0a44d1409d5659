/**
 * Tool execution loop and the adapter contract it drives
 */

export {
  isErrorResponse,
  type ToolCallRequest,
  type ToolCallResult,
  type ToolErrorType,
  type ToolResponse,
} from './call-protocol.js';
export type { ToolAdapter } from './tool-adapter.js';
export { normalizeArguments } from './argument-normalizer.js';
export {
  ToolExecutionLoop,
  defaultArgumentErrorFormatter,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_TOOL_TIMEOUT_MS,
  type ArgumentErrorFormatter,
  type ToolExecutionLoopOptions,
  type ToolLoopOutcome,
  type ToolLoopRequest,
  type ToolLoopStatus,
} from './tool-execution-loop.js';
