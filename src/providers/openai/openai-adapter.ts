import type { ToolCallRequest, ToolCallResult } from '../../loop/call-protocol.js';
import type { ToolAdapter } from '../../loop/tool-adapter.js';
import type {
  OpenAIChatClient,
  OpenAIChatCompletion,
  OpenAIMessage,
  OpenAITool,
  OpenAIToolMessage,
} from './openai-types.js';

export interface OpenAIToolAdapterOptions {
  client: OpenAIChatClient;
  model: string;
  /** Conversation history; the adapter appends to it in place */
  messages: OpenAIMessage[];
  tools?: OpenAITool[];
  temperature?: number;
  maxTokens?: number;
}

/**
 * OpenAIToolAdapter - Chat-completions side of the execution loop
 */
export class OpenAIToolAdapter implements ToolAdapter<OpenAIChatCompletion, OpenAIToolMessage> {
  private readonly options: OpenAIToolAdapterOptions;

  constructor(options: OpenAIToolAdapterOptions) {
    this.options = options;
  }

  get messages(): OpenAIMessage[] {
    return this.options.messages;
  }

  /**
   * Requests a completion for the current history
   */
  complete(): Promise<OpenAIChatCompletion> {
    const { client, model, messages, tools, temperature, maxTokens } = this.options;
    return client.chat.completions.create({
      model,
      messages,
      tools: tools && tools.length > 0 ? tools : undefined,
      temperature,
      max_tokens: maxTokens,
    });
  }

  extractCalls(response: OpenAIChatCompletion): ToolCallRequest[] {
    const toolCalls = response.choices[0]?.message.tool_calls ?? [];
    return toolCalls
      .filter((toolCall) => toolCall.type === 'function')
      .map((toolCall) => ({
        name: toolCall.function.name,
        arguments: toolCall.function.arguments,
        callId: toolCall.id,
      }));
  }

  recordAssistantMessage(response: OpenAIChatCompletion): void {
    const message = response.choices[0]?.message;
    if (message) {
      this.options.messages.push(message);
    }
  }

  buildResultMessage(result: ToolCallResult): OpenAIToolMessage {
    return {
      role: 'tool',
      tool_call_id: result.callId ?? '',
      name: result.name,
      content: JSON.stringify(result.response),
    };
  }

  sendResults(messages: OpenAIToolMessage[]): Promise<OpenAIChatCompletion> {
    this.options.messages.push(...messages);
    return this.complete();
  }
}
