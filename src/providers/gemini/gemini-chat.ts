import { Logger } from '../../logging/logger.js';
import { ToolExecutionLoop, type ToolExecutionLoopOptions } from '../../loop/tool-execution-loop.js';
import type { ChatResult } from '../chat-result.js';
import { GeminiToolAdapter, responseText } from './gemini-adapter.js';
import { GeminiToolRegistry } from './gemini-registry.js';
import type { GeminiContent, GeminiGenerateContentResponse, GeminiModelsClient } from './gemini-types.js';

export interface GeminiChatOptions {
  client: GeminiModelsClient;
  model: string;
  systemInstruction?: string;
  /** Tools offered on every request; a new empty registry by default */
  registry?: GeminiToolRegistry;
  temperature?: number;
  maxOutputTokens?: number;
  loop?: Omit<ToolExecutionLoopOptions, 'logger'>;
  logger?: Logger;
}

/**
 * GeminiChat - Answers a prompt through a Gemini model, running any tools
 * the model asks for along the way
 */
export class GeminiChat {
  readonly registry: GeminiToolRegistry;
  private readonly options: GeminiChatOptions;
  private readonly loop: ToolExecutionLoop;
  private readonly logger: Logger;

  constructor(options: GeminiChatOptions) {
    this.options = options;
    this.logger = (options.logger ?? Logger.silent()).child({ operation: 'gemini-chat' });
    this.registry = options.registry ?? new GeminiToolRegistry({ logger: options.logger });
    this.loop = new ToolExecutionLoop(this.registry, { ...options.loop, logger: options.logger });
  }

  /**
   * Sends one prompt in a fresh conversation
   */
  async ask(prompt: string): Promise<ChatResult<GeminiGenerateContentResponse>> {
    const contents: GeminiContent[] = [{ role: 'user', parts: [{ text: prompt }] }];
    const adapter = new GeminiToolAdapter({
      client: this.options.client,
      model: this.options.model,
      contents,
      tool: this.registry.manifest(),
      systemInstruction: this.options.systemInstruction,
      temperature: this.options.temperature,
      maxOutputTokens: this.options.maxOutputTokens,
    });

    this.logger.debug('Requesting content', { model: this.options.model, tools: this.registry.size });
    const outcome = await this.loop.run({ initialResponse: await adapter.complete(), adapter });

    return {
      text: responseText(outcome.response),
      status: outcome.status,
      iterations: outcome.iterations,
      response: outcome.response,
    };
  }
}
