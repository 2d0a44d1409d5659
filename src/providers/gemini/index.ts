export { GeminiToolRegistry, toGeminiSchema } from './gemini-registry.js';
export { GeminiToolAdapter, responseText, type GeminiToolAdapterOptions } from './gemini-adapter.js';
export { GeminiChat, type GeminiChatOptions } from './gemini-chat.js';
export type {
  GeminiContent,
  GeminiFunctionCall,
  GeminiFunctionDeclaration,
  GeminiFunctionResponse,
  GeminiGenerateContentRequest,
  GeminiGenerateContentResponse,
  GeminiModelsClient,
  GeminiPart,
  GeminiTool,
} from './gemini-types.js';
