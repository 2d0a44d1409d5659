import type { ToolLoopStatus } from '../loop/tool-execution-loop.js';

/**
 * What a chat core returns for one prompt
 */
export interface ChatResult<TResponse> {
  /** Text of the last model response; empty when it holds none */
  text: string;
  /** `capped` when the model was still asking for tools at the iteration limit */
  status: ToolLoopStatus;
  iterations: number;
  /** Last provider response, untouched */
  response: TResponse;
}
