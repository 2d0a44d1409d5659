/**
 * Provider chat cores, adapters and manifests
 */

export type { ChatResult } from './chat-result.js';

export {
  OpenAIChat,
  OpenAIToolAdapter,
  OpenAIToolRegistry,
  formatOpenAIArgumentError,
  type OpenAIChatClient,
  type OpenAIChatCompletion,
  type OpenAIChatOptions,
  type OpenAIMessage,
  type OpenAITool,
  type OpenAIToolAdapterOptions,
} from './openai/index.js';

export {
  GeminiChat,
  GeminiToolAdapter,
  GeminiToolRegistry,
  responseText,
  toGeminiSchema,
  type GeminiChatOptions,
  type GeminiContent,
  type GeminiGenerateContentResponse,
  type GeminiModelsClient,
  type GeminiPart,
  type GeminiTool,
  type GeminiToolAdapterOptions,
} from './gemini/index.js';
