import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ToolValidationError } from '../errors/tool-errors.js';
import { toolMetadataOf, type ArgsModel, type ToolImplementation } from '../tools/tool-definition.js';
import { isSchemaNode, type JSONSchema } from './json-schema.js';

/**
 * What introspection learns about a callable
 */
export interface IntrospectedTool {
  name: string;
  description: string;
  /** Parameter schema as generated, possibly holding `$ref`s and `$schema` */
  rawSchema: JSONSchema;
  argsModel: ArgsModel;
}

export interface IntrospectOptions {
  /** Registers the callable under this name instead of its own */
  name?: string;
  /** Used instead of the description attached to the callable */
  description?: string;
}

/**
 * An object model that takes keys beyond its declared shape stands for an
 * unbounded argument list
 */
function acceptsUndeclaredKeys(model: z.AnyZodObject): boolean {
  return model._def.unknownKeys === 'passthrough' || !(model._def.catchall instanceof z.ZodNever);
}

function toObjectModel(
  toolName: string,
  parameters: z.ZodRawShape | z.AnyZodObject | undefined,
): z.AnyZodObject {
  if (parameters === undefined) {
    return z.object({});
  }
  if (parameters instanceof z.ZodObject) {
    if (acceptsUndeclaredKeys(parameters)) {
      throw new ToolValidationError(
        `Tool '${toolName}' accepts a variable argument list, which cannot be described to a model. ` +
          'Declare every parameter explicitly.',
      );
    }
    return parameters;
  }
  return z.object(parameters);
}

/**
 * Builds the raw parameter schema of a described callable.
 *
 * Every parameter needs a description, given with zod's `.describe()`.
 * Optional parameters and parameters with a default are not required.
 * Sub-schemas used more than once, and recursive ones, come out as local
 * `$ref`s for the resolver to deal with.
 *
 * @throws ToolValidationError when the tool or one of its parameters has no description
 */
export function introspect(callable: ToolImplementation, options: IntrospectOptions = {}): IntrospectedTool {
  const metadata = toolMetadataOf(callable) ?? {};

  const name = options.name ?? metadata.name ?? callable.name;
  if (!name) {
    throw new ToolValidationError('Tool name could not be determined. Pass a name or use a named function.');
  }

  const description = options.description ?? metadata.description;
  if (description === undefined || description.trim() === '') {
    throw new ToolValidationError(
      `Tool '${name}' is missing a description. Models need a description of what the tool does.`,
    );
  }

  const model = toObjectModel(name, metadata.parameters);
  const shape: z.ZodRawShape = model.shape;
  for (const [paramName, paramSchema] of Object.entries(shape)) {
    if (!paramSchema.description?.trim()) {
      throw new ToolValidationError(
        `Parameter '${paramName}' in tool '${name}' is missing a description.\n` +
          `Usage: ${paramName}: z.string().describe('...')`,
      );
    }
  }

  const rawSchema: unknown = zodToJsonSchema(model, { $refStrategy: 'root', target: 'jsonSchema7' });
  if (!isSchemaNode(rawSchema)) {
    throw new ToolValidationError(`Parameters of tool '${name}' did not produce an object schema.`);
  }

  return { name, description, rawSchema, argsModel: model };
}
