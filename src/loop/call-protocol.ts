/**
 * Provider-neutral vocabulary exchanged between the execution loop and an adapter
 */

/**
 * One tool invocation the model asked for
 */
export interface ToolCallRequest {
  name: string;
  /** As sent by the provider: an object, a JSON string, entries, or nothing */
  arguments: unknown;
  /** Correlation id, when the provider assigns one */
  callId?: string;
}

/**
 * Payload fed back to the model for one call
 */
export type ToolResponse = { result: unknown } | { error: string };

/**
 * Why a call produced an error payload
 */
export type ToolErrorType = 'not_found' | 'arguments' | 'validation' | 'timeout' | 'execution';

/**
 * Outcome of one call, carrying the id of the request it answers
 */
export interface ToolCallResult {
  name: string;
  callId?: string;
  response: ToolResponse;
  errorType?: ToolErrorType;
}

export function isErrorResponse(response: ToolResponse): response is { error: string } {
  return 'error' in response;
}
