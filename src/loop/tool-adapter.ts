import type { ToolCallRequest, ToolCallResult } from './call-protocol.js';

/**
 * ToolAdapter - Translates one provider's native shapes to and from the
 * call vocabulary the execution loop works with.
 *
 * The loop calls {@link ToolAdapter.recordAssistantMessage} before any
 * result of the same turn reaches {@link ToolAdapter.sendResults}.
 */
export interface ToolAdapter<TResponse, TMessage> {
  /**
   * Lists the tool calls a model response asks for; empty when it asks for none
   */
  extractCalls(response: TResponse): ToolCallRequest[];

  /**
   * Appends the model's response to the conversation history
   */
  recordAssistantMessage(response: TResponse): void;

  /**
   * Packages one call result as a provider message
   */
  buildResultMessage(result: ToolCallResult): TMessage;

  /**
   * Sends a batch of result messages and returns the model's next response
   */
  sendResults(messages: TMessage[]): Promise<TResponse>;
}
