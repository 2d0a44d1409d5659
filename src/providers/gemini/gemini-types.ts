import type { JSONSchema } from '../../schema/json-schema.js';

/**
 * Structural subset of the `generateContent` wire format, matching what
 * `models.generateContent` of the Google Gen AI SDK takes and returns
 */

export interface GeminiFunctionDeclaration {
  name: string;
  description: string;
  parameters?: JSONSchema;
}

export interface GeminiTool {
  functionDeclarations: GeminiFunctionDeclaration[];
}

export interface GeminiFunctionCall {
  id?: string;
  name?: string;
  args?: Record<string, unknown>;
}

export interface GeminiFunctionResponse {
  id?: string;
  name: string;
  response: Record<string, unknown>;
}

export interface GeminiPart {
  text?: string;
  functionCall?: GeminiFunctionCall;
  functionResponse?: GeminiFunctionResponse;
}

export interface GeminiContent {
  role?: string;
  parts?: GeminiPart[];
}

export interface GeminiGenerateContentResponse {
  candidates?: Array<{
    content?: GeminiContent;
    finishReason?: string;
  }>;
}

export interface GeminiGenerateContentRequest {
  model: string;
  contents: GeminiContent[];
  config?: {
    systemInstruction?: string;
    tools?: GeminiTool[];
    temperature?: number;
    maxOutputTokens?: number;
  };
}

export interface GeminiModelsClient {
  generateContent(request: GeminiGenerateContentRequest): Promise<GeminiGenerateContentResponse>;
}
