/**
 * tool-relay - Provider-agnostic tool calling for LLM conversations
 */

export {
  ConfigManager,
  ToolRelayConfigSchema,
  DEFAULT_CONFIG,
  type ToolRelayConfig,
  type PartialToolRelayConfig,
  type ConfigValidationResult,
} from './config/index.js';

export {
  Logger,
  LOG_LEVELS,
  DEFAULT_LOGGER_CONFIG,
  type LogLevel,
  type LogThreshold,
  type LogContext,
  type LoggerConfig,
  type LogEntry,
} from './logging/index.js';

export {
  ToolRelayError,
  ToolRegistrationError,
  ToolNotFoundError,
  ToolValidationError,
  SchemaDepthError,
  ToolExecutionError,
  ToolTimeoutError,
  isRecoverableError,
} from './errors/index.js';

export {
  introspect,
  assertNoRecursiveRefs,
  inlineRefs,
  resolveSchema,
  sanitizeSchema,
  DEFAULT_MAX_SCHEMA_DEPTH,
  type JSONSchema,
  type IntrospectedTool,
  type IntrospectOptions,
  type ResolveOptions,
} from './schema/index.js';

export {
  ToolRegistry,
  attachToolMetadata,
  describeTool,
  TOOL_METADATA,
  type ToolRegistryOptions,
  type ToolDefinition,
  type ToolImplementation,
  type ToolArguments,
  type ToolContext,
  type ToolMetadata,
  type DescribedTool,
} from './tools/index.js';

export {
  ToolExecutionLoop,
  normalizeArguments,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_TOOL_TIMEOUT_MS,
  type ToolAdapter,
  type ToolCallRequest,
  type ToolCallResult,
  type ToolResponse,
  type ToolErrorType,
  type ArgumentErrorFormatter,
  type ToolExecutionLoopOptions,
  type ToolLoopOutcome,
  type ToolLoopStatus,
} from './loop/index.js';

export {
  OpenAIChat,
  OpenAIToolAdapter,
  OpenAIToolRegistry,
  GeminiChat,
  GeminiToolAdapter,
  GeminiToolRegistry,
  type ChatResult,
  type OpenAIChatClient,
  type OpenAIChatCompletion,
  type OpenAITool,
  type GeminiModelsClient,
  type GeminiGenerateContentResponse,
  type GeminiTool,
} from './providers/index.js';
