/**
 * Configuration module
 */

export {
  ConfigManager,
  ToolRelayConfigSchema,
  DEFAULT_CONFIG,
  type ToolRelayConfig,
  type PartialToolRelayConfig,
  type ConfigValidationResult,
} from './config-manager.js';
