import type { ToolCallRequest, ToolCallResult } from '../../loop/call-protocol.js';
import type { ToolAdapter } from '../../loop/tool-adapter.js';
import type {
  GeminiContent,
  GeminiFunctionCall,
  GeminiGenerateContentResponse,
  GeminiModelsClient,
  GeminiPart,
  GeminiTool,
} from './gemini-types.js';

export interface GeminiToolAdapterOptions {
  client: GeminiModelsClient;
  model: string;
  /** Conversation contents; the adapter appends to them in place */
  contents: GeminiContent[];
  tool?: GeminiTool;
  systemInstruction?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

function hasName(call: GeminiFunctionCall | undefined): call is GeminiFunctionCall & { name: string } {
  return typeof call?.name === 'string' && call.name !== '';
}

/**
 * GeminiToolAdapter - `generateContent` side of the execution loop.
 * All results of one batch travel back in a single `user` content.
 */
export class GeminiToolAdapter implements ToolAdapter<GeminiGenerateContentResponse, GeminiPart> {
  private readonly options: GeminiToolAdapterOptions;

  constructor(options: GeminiToolAdapterOptions) {
    this.options = options;
  }

  get contents(): GeminiContent[] {
    return this.options.contents;
  }

  /**
   * Requests the next response for the current contents
   */
  complete(): Promise<GeminiGenerateContentResponse> {
    const { client, model, contents, tool, systemInstruction, temperature, maxOutputTokens } = this.options;
    return client.generateContent({
      model,
      contents,
      config: {
        systemInstruction,
        tools: tool ? [tool] : undefined,
        temperature,
        maxOutputTokens,
      },
    });
  }

  extractCalls(response: GeminiGenerateContentResponse): ToolCallRequest[] {
    const parts = response.candidates?.[0]?.content?.parts ?? [];
    return parts
      .map((part) => part.functionCall)
      .filter(hasName)
      .map((call) => ({ name: call.name, arguments: call.args, callId: call.id }));
  }

  recordAssistantMessage(response: GeminiGenerateContentResponse): void {
    const content = response.candidates?.[0]?.content;
    if (content) {
      this.options.contents.push({ role: 'model', parts: content.parts ?? [] });
    }
  }

  buildResultMessage(result: ToolCallResult): GeminiPart {
    return {
      functionResponse: {
        id: result.callId,
        name: result.name,
        response: { ...result.response },
      },
    };
  }

  sendResults(parts: GeminiPart[]): Promise<GeminiGenerateContentResponse> {
    this.options.contents.push({ role: 'user', parts });
    return this.complete();
  }
}

/**
 * Joins the text parts of the first candidate
 */
export function responseText(response: GeminiGenerateContentResponse): string {
  const parts = response.candidates?.[0]?.content?.parts ?? [];
  return parts.map((part) => part.text ?? '').join('');
}
