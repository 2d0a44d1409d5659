import { ToolNotFoundError, ToolRegistrationError } from '../errors/tool-errors.js';
import { Logger } from '../logging/logger.js';
import type { JSONSchema } from '../schema/json-schema.js';
import { introspect } from '../schema/parameter-introspector.js';
import { DEFAULT_MAX_SCHEMA_DEPTH, resolveSchema } from '../schema/schema-resolver.js';
import { sanitizeSchema } from '../schema/schema-sanitizer.js';
import {
  isToolDefinition,
  type ToolDefinition,
  type ToolImplementation,
} from './tool-definition.js';

/**
 * Registry options
 */
export interface ToolRegistryOptions {
  logger?: Logger;
  /** Depth bound applied while inlining schema references */
  maxSchemaDepth?: number;
}

/**
 * ToolRegistry - Owns the tools offered to a model.
 *
 * Registration turns a callable into a definition by introspection, cycle
 * check, reference inlining and sanitization, and fails as a whole: a tool
 * is either fully registered or not at all. Lookup is exact and
 * case-sensitive. There is no locking: callers mutating the registry while
 * a turn executes must serialize that themselves.
 *
 * Each provider subclasses this and builds its own tool listing in
 * {@link ToolRegistry.manifest}.
 */
export abstract class ToolRegistry<TManifest = unknown> {
  protected readonly tools = new Map<string, ToolDefinition>();
  protected readonly logger: Logger;
  private readonly maxSchemaDepth: number;

  constructor(options: ToolRegistryOptions = {}) {
    this.logger = (options.logger ?? Logger.silent()).child({ operation: 'registry' });
    this.maxSchemaDepth = options.maxSchemaDepth ?? DEFAULT_MAX_SCHEMA_DEPTH;
  }

  /**
   * Builds the provider-specific tool listing sent with each request
   */
  abstract manifest(): TManifest;

  /**
   * Registers a ready-made definition, used as-is. The registry keeps a
   * frozen copy; later changes to the passed object do not reach it.
   */
  register(definition: ToolDefinition): ToolDefinition;
  /**
   * Registers a described callable; `description` replaces the attached one
   */
  register(callable: ToolImplementation, description?: string): ToolDefinition;
  /**
   * Registers an implementation under an explicit name. Without `parameters`
   * the implementation is introspected; with them a description is required.
   */
  register(
    name: string,
    description: string | undefined,
    implementation: ToolImplementation | undefined,
    parameters?: JSONSchema,
  ): ToolDefinition;
  register(
    nameOrTool: string | ToolDefinition | ToolImplementation,
    description?: string,
    implementation?: ToolImplementation,
    parameters?: JSONSchema,
  ): ToolDefinition {
    const tool = this.buildDefinition(nameOrTool, description, implementation, parameters);

    if (this.tools.has(tool.name)) {
      const msg = `Tool '${tool.name}' is already registered.`;
      this.logger.error(msg, undefined, { tool: tool.name });
      throw new ToolRegistrationError(msg);
    }

    this.tools.set(tool.name, tool);
    this.logger.info(`Successfully registered tool: '${tool.name}'`, { tool: tool.name });
    return tool;
  }

  /**
   * Registers a described callable and hands it back unchanged
   */
  tool<T extends ToolImplementation>(callable: T): T {
    this.register(callable);
    return callable;
  }

  /**
   * Unregisters a tool by name
   * @throws ToolNotFoundError when no tool has that name
   */
  unregister(name: string): void {
    if (!this.tools.delete(name)) {
      throw new ToolNotFoundError(`Tool '${name}' not found in the registry.`);
    }
    this.logger.info(`Successfully unregistered tool: '${name}'`, { tool: name });
  }

  /**
   * Gets a tool definition by name
   */
  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  /**
   * Checks if a tool is registered
   */
  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Lists all registered tool definitions
   */
  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Name → implementation view, for execution
   */
  get implementations(): ReadonlyMap<string, ToolImplementation> {
    return new Map(Array.from(this.tools, ([name, tool]) => [name, tool.implementation]));
  }

  private buildDefinition(
    nameOrTool: string | ToolDefinition | ToolImplementation,
    description: string | undefined,
    implementation: ToolImplementation | undefined,
    parameters: JSONSchema | undefined,
  ): ToolDefinition {
    if (typeof nameOrTool === 'function') {
      return this.fromCallable(nameOrTool, { description });
    }

    if (typeof nameOrTool !== 'string') {
      if (!isToolDefinition(nameOrTool)) {
        throw new ToolRegistrationError('Expected a tool definition, a tool name or a callable.');
      }
      const { parameters: schema, ...rest } = nameOrTool;
      return Object.freeze<ToolDefinition>(
        schema === undefined ? rest : { ...rest, parameters: structuredClone(schema) },
      );
    }

    const name = nameOrTool;
    if (name === '') {
      throw new ToolRegistrationError('Tool name must not be empty.');
    }
    if (implementation === undefined) {
      throw new ToolRegistrationError('If passing a name, an implementation is required.');
    }
    if (parameters === undefined) {
      return this.fromCallable(implementation, { name, description });
    }
    if (description === undefined) {
      throw new ToolRegistrationError('If passing a name and parameters, a description is required.');
    }

    return Object.freeze<ToolDefinition>({
      name,
      description,
      implementation,
      parameters: this.prepareSchema(name, parameters),
    });
  }

  private fromCallable(
    callable: ToolImplementation,
    overrides: { name?: string; description?: string },
  ): ToolDefinition {
    try {
      const introspected = introspect(callable, overrides);
      return Object.freeze<ToolDefinition>({
        name: introspected.name,
        description: introspected.description,
        implementation: callable,
        parameters: this.prepareSchema(introspected.name, introspected.rawSchema),
        argsModel: introspected.argsModel,
      });
    } catch (error) {
      this.logger.error('Tool introspection failed', error, { tool: overrides.name ?? callable.name });
      throw error;
    }
  }

  private prepareSchema(name: string, schema: JSONSchema): JSONSchema {
    const resolved = resolveSchema(schema, { maxDepth: this.maxSchemaDepth });
    const sanitized = sanitizeSchema(resolved);
    this.logger.debug('Prepared parameter schema', { tool: name });
    return sanitized;
  }
}
