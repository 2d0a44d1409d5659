import { z } from 'zod';
import { readFile } from 'node:fs/promises';

/**
 * Configuration schema using Zod for validation
 */
export const ToolRelayConfigSchema = z.object({
  loop: z.object({
    maxIterations: z.number().int().min(1).max(100).default(5),
    toolTimeoutMs: z.number().int().min(1).default(180_000),
  }).default({}),

  schema: z.object({
    maxDepth: z.number().int().min(1).max(1000).default(20),
  }).default({}),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    path: z.string().min(1).nullable().default(null),
    maxSize: z.number().int().min(1024).default(10 * 1024 * 1024), // 10MB
    maxFiles: z.number().int().min(1).max(100).default(5),
  }).default({}),
});

/**
 * Type for the full configuration
 */
export type ToolRelayConfig = z.infer<typeof ToolRelayConfigSchema>;

/**
 * Type for partial configuration (user overrides)
 */
export type PartialToolRelayConfig = z.input<typeof ToolRelayConfigSchema>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ToolRelayConfig = ToolRelayConfigSchema.parse({});

/**
 * Environment variable prefix for configuration overrides
 */
const ENV_PREFIX = 'TOOL_RELAY_';

type EnvValueKind = 'int' | 'string' | 'nullable-string';

interface EnvMapping {
  path: [string, string];
  kind: EnvValueKind;
}

/**
 * Mapping of environment variables to config paths
 */
const ENV_MAPPINGS: Record<string, EnvMapping> = {
  [`${ENV_PREFIX}LOOP_MAX_ITERATIONS`]: { path: ['loop', 'maxIterations'], kind: 'int' },
  [`${ENV_PREFIX}LOOP_TOOL_TIMEOUT_MS`]: { path: ['loop', 'toolTimeoutMs'], kind: 'int' },
  [`${ENV_PREFIX}SCHEMA_MAX_DEPTH`]: { path: ['schema', 'maxDepth'], kind: 'int' },
  [`${ENV_PREFIX}LOGGING_LEVEL`]: { path: ['logging', 'level'], kind: 'string' },
  [`${ENV_PREFIX}LOGGING_PATH`]: { path: ['logging', 'path'], kind: 'nullable-string' },
  [`${ENV_PREFIX}LOGGING_MAX_SIZE`]: { path: ['logging', 'maxSize'], kind: 'int' },
  [`${ENV_PREFIX}LOGGING_MAX_FILES`]: { path: ['logging', 'maxFiles'], kind: 'int' },
};

/**
 * Result of configuration validation
 */
export interface ConfigValidationResult {
  success: boolean;
  config?: ToolRelayConfig;
  errors?: string[];
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * ConfigManager - Loads and validates configuration.
 *
 * Precedence: defaults → JSON file → `TOOL_RELAY_*` environment variables.
 */
export class ConfigManager {
  private configPath: string;
  private currentConfig: ToolRelayConfig;
  private env: NodeJS.ProcessEnv;

  /**
   * Creates a new ConfigManager instance
   * @param configPath - Path to the configuration file
   * @param env - Environment to read overrides from
   */
  constructor(configPath: string, env: NodeJS.ProcessEnv = process.env) {
    this.configPath = configPath;
    this.currentConfig = DEFAULT_CONFIG;
    this.env = env;
  }

  /**
   * Gets the current configuration
   */
  get config(): ToolRelayConfig {
    return this.currentConfig;
  }

  /**
   * Gets the path to the configuration file
   */
  get path(): string {
    return this.configPath;
  }

  /**
   * Loads configuration with precedence: defaults → file → environment
   */
  async load(): Promise<ConfigValidationResult> {
    let fileConfig: PlainObject = {};

    try {
      const content = await readFile(this.configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);
      if (!isPlainObject(parsed)) {
        return { success: false, errors: ['Configuration file must contain a JSON object'] };
      }
      fileConfig = parsed;
    } catch (error) {
      // A missing file means defaults
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      if (code !== 'ENOENT') {
        return {
          success: false,
          errors: [`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`],
        };
      }
    }

    let envOverrides: PlainObject;
    try {
      envOverrides = this.getEnvironmentOverrides();
    } catch (error) {
      return { success: false, errors: [error instanceof Error ? error.message : String(error)] };
    }

    return this.validate(deepMerge(fileConfig, envOverrides));
  }

  /**
   * Validates a partial configuration and returns the full config with defaults
   */
  validate(partialConfig: unknown): ConfigValidationResult {
    const result = ToolRelayConfigSchema.safeParse(partialConfig);

    if (result.success) {
      this.currentConfig = result.data;
      return {
        success: true,
        config: result.data,
      };
    }

    const errors = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return `Configuration error at '${path}': ${issue.message}`;
    });

    return {
      success: false,
      errors,
    };
  }

  /**
   * Gets configuration overrides from environment variables
   */
  private getEnvironmentOverrides(): PlainObject {
    const overrides: PlainObject = {};

    for (const [envVar, mapping] of Object.entries(ENV_MAPPINGS)) {
      const value = this.env[envVar];
      if (value !== undefined) {
        setNestedValue(overrides, mapping.path, parseEnvValue(envVar, value, mapping.kind));
      }
    }

    return overrides;
  }
}

/**
 * Parses an environment variable value to the appropriate type
 */
function parseEnvValue(envVar: string, value: string, kind: EnvValueKind): unknown {
  switch (kind) {
    case 'int': {
      const num = Number.parseInt(value, 10);
      if (Number.isNaN(num)) {
        throw new Error(`Invalid numeric value for ${envVar}: ${value}`);
      }
      return num;
    }
    case 'nullable-string':
      return value === '' ? null : value;
    case 'string':
      return value;
  }
}

function setNestedValue(obj: PlainObject, path: readonly string[], value: unknown): void {
  let current = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const key = path[i];
    if (key === undefined) continue;
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Deep merges two configuration objects; later values override earlier ones
 */
function deepMerge(base: PlainObject, overrides: PlainObject): PlainObject {
  const result: PlainObject = { ...base };

  for (const [key, value] of Object.entries(overrides)) {
    const existing = result[key];
    if (isPlainObject(value) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}
