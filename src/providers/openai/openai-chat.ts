import { errorMessage } from '../../errors/tool-errors.js';
import { Logger } from '../../logging/logger.js';
import {
  ToolExecutionLoop,
  type ArgumentErrorFormatter,
  type ToolExecutionLoopOptions,
} from '../../loop/tool-execution-loop.js';
import type { ChatResult } from '../chat-result.js';
import { OpenAIToolAdapter } from './openai-adapter.js';
import { OpenAIToolRegistry } from './openai-registry.js';
import type { OpenAIChatClient, OpenAIChatCompletion, OpenAIMessage } from './openai-types.js';

export interface OpenAIChatOptions {
  client: OpenAIChatClient;
  model: string;
  systemInstruction?: string;
  /** Tools offered on every request; a new empty registry by default */
  registry?: OpenAIToolRegistry;
  temperature?: number;
  maxTokens?: number;
  loop?: Omit<ToolExecutionLoopOptions, 'logger'>;
  logger?: Logger;
}

export const formatOpenAIArgumentError: ArgumentErrorFormatter = (_toolName, error) =>
  `Failed to decode function arguments: ${errorMessage(error)}`;

/**
 * OpenAIChat - Answers a prompt through a chat-completions model, running
 * any tools the model asks for along the way
 */
export class OpenAIChat {
  readonly registry: OpenAIToolRegistry;
  private readonly options: OpenAIChatOptions;
  private readonly loop: ToolExecutionLoop;
  private readonly logger: Logger;

  constructor(options: OpenAIChatOptions) {
    this.options = options;
    this.logger = (options.logger ?? Logger.silent()).child({ operation: 'openai-chat' });
    this.registry = options.registry ?? new OpenAIToolRegistry({ logger: options.logger });
    this.loop = new ToolExecutionLoop(this.registry, {
      argumentErrorFormatter: formatOpenAIArgumentError,
      ...options.loop,
      logger: options.logger,
    });
  }

  /**
   * Sends one prompt in a fresh conversation
   */
  async ask(prompt: string): Promise<ChatResult<OpenAIChatCompletion>> {
    const messages: OpenAIMessage[] = [];
    if (this.options.systemInstruction) {
      messages.push({ role: 'system', content: this.options.systemInstruction });
    }
    messages.push({ role: 'user', content: prompt });

    const adapter = new OpenAIToolAdapter({
      client: this.options.client,
      model: this.options.model,
      messages,
      tools: this.registry.manifest(),
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
    });

    this.logger.debug('Requesting completion', { model: this.options.model, tools: this.registry.size });
    const outcome = await this.loop.run({ initialResponse: await adapter.complete(), adapter });

    return {
      text: outcome.response.choices[0]?.message.content ?? '',
      status: outcome.status,
      iterations: outcome.iterations,
      response: outcome.response,
    };
  }
}
