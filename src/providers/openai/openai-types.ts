import type { JSONSchema } from '../../schema/json-schema.js';

/**
 * Structural subset of the chat-completions wire format. Any client whose
 * `chat.completions.create` accepts and returns these shapes can be used,
 * including the official SDK.
 */

export interface OpenAITool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: JSONSchema;
  };
}

export interface OpenAIToolCall {
  id: string;
  type: string;
  function: {
    name: string;
    /** JSON-encoded argument object */
    arguments: string;
  };
}

export interface OpenAIAssistantMessage {
  role: 'assistant';
  content: string | null;
  tool_calls?: OpenAIToolCall[];
}

export type OpenAIMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | OpenAIAssistantMessage
  | { role: 'tool'; tool_call_id: string; name: string; content: string };

export type OpenAIToolMessage = Extract<OpenAIMessage, { role: 'tool' }>;

export interface OpenAIChatCompletion {
  id?: string;
  choices: Array<{
    index?: number;
    message: OpenAIAssistantMessage;
    finish_reason?: string | null;
  }>;
}

export interface OpenAIChatCompletionRequest {
  model: string;
  messages: OpenAIMessage[];
  tools?: OpenAITool[];
  temperature?: number;
  max_tokens?: number;
}

export interface OpenAIChatClient {
  chat: {
    completions: {
      create(request: OpenAIChatCompletionRequest): Promise<OpenAIChatCompletion>;
    };
  };
}
