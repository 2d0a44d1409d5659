import { z } from 'zod';
import { ToolValidationError } from '../errors/tool-errors.js';
import type { JSONSchema } from '../schema/json-schema.js';

/**
 * Arguments handed to a tool implementation, keyed by parameter name
 */
export type ToolArguments = Record<string, unknown>;

/**
 * Per-call context handed to a tool implementation
 */
export interface ToolContext {
  /** Aborted when the call times out */
  signal: AbortSignal;
  /** Correlation id of the originating request, when the provider sent one */
  callId?: string;
}

/**
 * A tool implementation. May return a value or a promise of one.
 *
 * To report a failure the model should see and react to, throw a
 * `ToolExecutionError`. A plain `Error` is not in the recoverable set of
 * `isRecoverableError`: it aborts the whole turn.
 */
export type ToolImplementation = (args: ToolArguments, context: ToolContext) => unknown;

/**
 * Validates and coerces raw arguments before the implementation runs
 */
export type ArgsModel = z.ZodType<ToolArguments, z.ZodTypeDef, unknown>;

/**
 * Tool definition as stored in a registry
 */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly implementation: ToolImplementation;
  /** Resolved, sanitized parameter schema; absent for tools without parameters */
  readonly parameters?: JSONSchema;
  readonly argsModel?: ArgsModel;
}

/**
 * Metadata a callable carries so it can be registered without a hand-written schema
 */
export interface ToolMetadata {
  /** Defaults to the function's own name */
  name?: string;
  /** What the tool does, as shown to the model */
  description?: string;
  /** Parameter name → zod schema; each schema needs `.describe(...)` */
  parameters?: z.ZodRawShape | z.AnyZodObject;
}

export const TOOL_METADATA: unique symbol = Symbol('tool-relay.metadata');

/**
 * A callable with attached tool metadata
 */
export type DescribedTool = ToolImplementation & {
  readonly [TOOL_METADATA]?: ToolMetadata;
};

/**
 * Attaches tool metadata to an implementation that reads its arguments untyped
 */
export function attachToolMetadata(implementation: ToolImplementation, metadata: ToolMetadata): DescribedTool {
  return Object.assign(implementation, { [TOOL_METADATA]: metadata });
}

/**
 * Declares a tool from a typed function.
 *
 * The function receives its arguments already parsed by the parameter
 * shape, so defaults are applied and the argument object is typed.
 *
 * @example
 * const add = describeTool(
 *   {
 *     description: 'Adds two numbers.',
 *     parameters: {
 *       a: z.number().describe('First addend'),
 *       b: z.number().describe('Second addend'),
 *     },
 *   },
 *   function add({ a, b }) {
 *     const sum = a + b;
 *     if (!Number.isFinite(sum)) {
 *       throw new ToolExecutionError('The sum is too large.');
 *     }
 *     return sum;
 *   },
 * );
 */
export function describeTool<S extends z.ZodRawShape, R>(
  metadata: { name?: string; description: string; parameters: S },
  fn: (args: z.infer<z.ZodObject<S>>, context: ToolContext) => R,
): DescribedTool {
  const model = z.object(metadata.parameters);
  const implementation: ToolImplementation = (args, context) => fn(model.parse(args), context);
  return attachToolMetadata(implementation, {
    name: metadata.name ?? fn.name,
    description: metadata.description,
    parameters: metadata.parameters,
  });
}

/**
 * Reads the metadata attached to a callable, if any
 */
export function toolMetadataOf(callable: ToolImplementation): ToolMetadata | undefined {
  if (!(TOOL_METADATA in callable)) {
    return undefined;
  }
  const metadata = callable[TOOL_METADATA];
  if (metadata === null || typeof metadata !== 'object') {
    return undefined;
  }
  if ('parameters' in metadata && metadata.parameters !== undefined && !isParameterShape(metadata.parameters)) {
    throw new ToolValidationError('Tool parameters must be a zod object or a map of zod schemas.');
  }
  return {
    name: 'name' in metadata && typeof metadata.name === 'string' ? metadata.name : undefined,
    description:
      'description' in metadata && typeof metadata.description === 'string' ? metadata.description : undefined,
    parameters:
      'parameters' in metadata && isParameterShape(metadata.parameters) ? metadata.parameters : undefined,
  };
}

function isParameterShape(value: unknown): value is z.ZodRawShape | z.AnyZodObject {
  if (value instanceof z.ZodObject) {
    return true;
  }
  if (value === null || typeof value !== 'object') {
    return false;
  }
  return Object.values(value).every((entry) => entry instanceof z.ZodType);
}

/**
 * Checks whether a value is a ready-made tool definition
 */
export function isToolDefinition(value: unknown): value is ToolDefinition {
  if (value === null || typeof value !== 'object') {
    return false;
  }
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'description' in value &&
    typeof value.description === 'string' &&
    'implementation' in value &&
    typeof value.implementation === 'function'
  );
}
