export { OpenAIToolRegistry } from './openai-registry.js';
export { OpenAIToolAdapter, type OpenAIToolAdapterOptions } from './openai-adapter.js';
export { OpenAIChat, formatOpenAIArgumentError, type OpenAIChatOptions } from './openai-chat.js';
export type {
  OpenAIAssistantMessage,
  OpenAIChatClient,
  OpenAIChatCompletion,
  OpenAIChatCompletionRequest,
  OpenAIMessage,
  OpenAITool,
  OpenAIToolCall,
  OpenAIToolMessage,
} from './openai-types.js';
