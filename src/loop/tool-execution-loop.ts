import type { ZodError } from 'zod';
import type { ToolRelayConfig } from '../config/config-manager.js';
import { errorMessage, isRecoverableError, ToolTimeoutError } from '../errors/tool-errors.js';
import { Logger } from '../logging/logger.js';
import type { ToolArguments, ToolDefinition } from '../tools/tool-definition.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { normalizeArguments } from './argument-normalizer.js';
import type { ToolCallRequest, ToolCallResult, ToolErrorType } from './call-protocol.js';
import type { ToolAdapter } from './tool-adapter.js';

export const DEFAULT_MAX_ITERATIONS = 5;

export const DEFAULT_TOOL_TIMEOUT_MS = 180_000;

/**
 * Builds the error text fed back to the model when a call's arguments
 * cannot be turned into an argument object
 */
export type ArgumentErrorFormatter = (toolName: string, error: unknown) => string;

export const defaultArgumentErrorFormatter: ArgumentErrorFormatter = (toolName, error) =>
  `Failed to parse arguments for tool '${toolName}': ${errorMessage(error)}`;

/**
 * Loop options
 */
export interface ToolExecutionLoopOptions {
  /** Model round trips allowed per turn */
  maxIterations?: number;
  /** Time limit for each call */
  toolTimeoutMs?: number;
  argumentErrorFormatter?: ArgumentErrorFormatter;
  logger?: Logger;
}

export interface ToolLoopRequest<TResponse, TMessage> {
  initialResponse: TResponse;
  adapter: ToolAdapter<TResponse, TMessage>;
}

/**
 * `done`: the last response asks for no tools.
 * `capped`: the iteration budget ran out; the response may still ask for tools.
 */
export type ToolLoopStatus = 'done' | 'capped';

export interface ToolLoopOutcome<TResponse> {
  response: TResponse;
  status: ToolLoopStatus;
  /** Batches of tool calls executed */
  iterations: number;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * ToolExecutionLoop - Runs model-requested tool calls until the model stops
 * asking for them or the iteration budget is spent.
 *
 * Each iteration records the model's response, executes every call it asks
 * for concurrently, and sends one result message per call back through the
 * adapter. Recoverable tool failures become `{ error }` payloads the model
 * can react to; anything else rejects {@link ToolExecutionLoop.run}.
 */
export class ToolExecutionLoop {
  private readonly registry: ToolRegistry;
  private readonly maxIterations: number;
  private readonly toolTimeoutMs: number;
  private readonly formatArgumentError: ArgumentErrorFormatter;
  private readonly logger: Logger;

  constructor(registry: ToolRegistry, options: ToolExecutionLoopOptions = {}) {
    this.registry = registry;
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.toolTimeoutMs = options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
    this.formatArgumentError = options.argumentErrorFormatter ?? defaultArgumentErrorFormatter;
    this.logger = (options.logger ?? Logger.silent()).child({ operation: 'tool-loop' });
  }

  /**
   * Creates a loop with the limits of a loaded configuration
   */
  static fromConfig(
    registry: ToolRegistry,
    config: ToolRelayConfig,
    options: Pick<ToolExecutionLoopOptions, 'argumentErrorFormatter' | 'logger'> = {},
  ): ToolExecutionLoop {
    return new ToolExecutionLoop(registry, {
      ...options,
      maxIterations: config.loop.maxIterations,
      toolTimeoutMs: config.loop.toolTimeoutMs,
    });
  }

  /**
   * Drives one turn, starting from the model's first response
   */
  async run<TResponse, TMessage>(request: ToolLoopRequest<TResponse, TMessage>): Promise<ToolLoopOutcome<TResponse>> {
    const { adapter } = request;
    let response = request.initialResponse;

    for (let iteration = 0; iteration < this.maxIterations; iteration++) {
      const calls = adapter.extractCalls(response);
      adapter.recordAssistantMessage(response);

      if (calls.length === 0) {
        this.logger.debug('Model requested no tools', { iteration });
        return { response, status: 'done', iterations: iteration };
      }

      this.logger.info(`Executing ${calls.length} tool call(s)`, {
        iteration,
        tools: calls.map((call) => call.name),
      });

      const results = await this.executeCalls(calls);
      const messages = results.map((result) => adapter.buildResultMessage(result));
      response = await adapter.sendResults(messages);
    }

    this.logger.warn(`Iteration limit of ${this.maxIterations} reached; returning the last response`, {
      maxIterations: this.maxIterations,
    });
    return { response, status: 'capped', iterations: this.maxIterations };
  }

  /**
   * Executes a batch concurrently; results come back in request order
   */
  executeCalls(calls: ToolCallRequest[]): Promise<ToolCallResult[]> {
    return Promise.all(calls.map((call) => this.executeCall(call)));
  }

  /**
   * Executes one call. Resolves with an error payload for every recoverable
   * failure and rejects only for fatal ones.
   */
  async executeCall(call: ToolCallRequest): Promise<ToolCallResult> {
    const context = { tool: call.name, callId: call.callId };

    const tool = this.registry.get(call.name);
    if (!tool) {
      this.logger.warn('Requested tool is not registered', context);
      return this.failure(call, `Tool '${call.name}' not found in registry.`, 'not_found');
    }

    let args: ToolArguments;
    try {
      args = normalizeArguments(call.arguments);
    } catch (error) {
      this.logger.warn('Tool arguments could not be parsed', { ...context, detail: errorMessage(error) });
      return this.failure(call, this.formatArgumentError(call.name, error), 'arguments');
    }

    if (tool.argsModel) {
      const parsed = tool.argsModel.safeParse(args);
      if (!parsed.success) {
        const detail = describeIssues(parsed.error);
        this.logger.warn('Tool arguments failed validation', { ...context, detail });
        return this.failure(call, `Argument validation failed: ${detail}`, 'validation');
      }
      args = parsed.data;
    }

    const started = Date.now();
    try {
      const value = await this.invoke(tool, args, call.callId);
      this.logger.debug('Tool call succeeded', { ...context, durationMs: Date.now() - started });
      return { name: call.name, callId: call.callId, response: { result: value === undefined ? null : value } };
    } catch (error) {
      if (!isRecoverableError(error)) {
        this.logger.error('Tool call failed fatally', error, context);
        throw error;
      }
      const errorType: ToolErrorType = error instanceof ToolTimeoutError ? 'timeout' : 'execution';
      this.logger.warn('Tool call failed', { ...context, errorType, detail: error.message });
      return this.failure(call, error.message, errorType);
    }
  }

  /**
   * Starts the implementation on its own macrotask, so a synchronous tool
   * runs only after every sibling call has been dispatched. The call's clock
   * starts when the implementation does: time spent waiting behind a
   * blocking sibling does not count against it. A synchronous stretch that
   * overruns the limit fails the call as soon as it returns. A timeout aborts
   * the call's signal; a late result is discarded.
   */
  private invoke(tool: ToolDefinition, args: ToolArguments, callId: string | undefined): Promise<unknown> {
    const controller = new AbortController();

    return new Promise<unknown>((resolve, reject) => {
      setImmediate(() => {
        const timeOut = (): void => {
          clearTimeout(timer);
          controller.abort();
          reject(new ToolTimeoutError(this.toolTimeoutMs));
        };
        const timer = setTimeout(timeOut, this.toolTimeoutMs);
        const started = Date.now();

        let pending: unknown;
        try {
          pending = tool.implementation(args, { signal: controller.signal, callId });
        } catch (error) {
          clearTimeout(timer);
          reject(error);
          return;
        }

        if (Date.now() - started > this.toolTimeoutMs) {
          timeOut();
        }

        Promise.resolve(pending).then(
          (value) => {
            clearTimeout(timer);
            resolve(value);
          },
          (error: unknown) => {
            clearTimeout(timer);
            if (controller.signal.aborted) {
              this.logger.debug('Discarded failure of a timed-out call', { tool: tool.name, callId });
            }
            reject(error);
          },
        );
      });
    });
  }

  private failure(call: ToolCallRequest, message: string, errorType: ToolErrorType): ToolCallResult {
    return { name: call.name, callId: call.callId, response: { error: message }, errorType };
  }
}
