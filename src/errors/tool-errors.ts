import { ZodError } from 'zod';

/**
 * Error taxonomy for tool registration, schema processing and execution.
 *
 * Registration-time and schema-time errors are thrown to the caller of
 * `register`. Execution-time errors listed in {@link isRecoverableError}
 * are turned into `{ error }` payloads by the execution loop instead.
 */

/**
 * Base class for every error raised by this library
 */
export class ToolRelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Duplicate tool name, or a registration call missing a required argument
 */
export class ToolRegistrationError extends ToolRelayError {}

/**
 * A tool name that is not present in the registry
 */
export class ToolNotFoundError extends ToolRelayError {}

/**
 * Tool or parameter description missing, or a parameter schema that cannot
 * be offered to a model (recursive, unresolvable, variadic)
 */
export class ToolValidationError extends ToolRelayError {}

/**
 * Reference inlining went deeper than the configured limit.
 * Kept apart from the recursion failure: the schema is acyclic, just too deep.
 */
export class SchemaDepthError extends ToolValidationError {
  readonly maxDepth: number;

  constructor(message: string, maxDepth: number) {
    super(message);
    this.maxDepth = maxDepth;
  }
}

/**
 * A tool call failed in a way the model can be told about and retry
 */
export class ToolExecutionError extends ToolRelayError {}

/**
 * A tool call ran past its time limit
 */
export class ToolTimeoutError extends ToolExecutionError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Tool execution timed out after ${timeoutMs / 1000} seconds.`);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Node system error codes treated as ordinary tool failures
 * (missing file, existing file, permission, wrong kind of path)
 */
export const RECOVERABLE_SYSTEM_ERROR_CODES: ReadonlySet<string> = new Set([
  'ENOENT',
  'EEXIST',
  'EACCES',
  'EPERM',
  'EISDIR',
  'ENOTDIR',
]);

/**
 * Checks whether an error thrown by a tool implementation belongs to the
 * closed set of recoverable kinds. Everything else aborts the turn.
 */
export function isRecoverableError(error: unknown): error is Error {
  if (!(error instanceof Error)) {
    return false;
  }

  if (
    error instanceof ToolExecutionError ||
    error instanceof ToolValidationError ||
    error instanceof TypeError ||
    error instanceof RangeError ||
    error instanceof SyntaxError ||
    error instanceof ZodError
  ) {
    return true;
  }

  const code = 'code' in error ? error.code : undefined;
  return typeof code === 'string' && RECOVERABLE_SYSTEM_ERROR_CODES.has(code);
}

/**
 * Extracts a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
