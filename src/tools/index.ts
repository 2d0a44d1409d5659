/**
 * Tools - definitions, described callables and the registry
 */

export {
  attachToolMetadata,
  describeTool,
  isToolDefinition,
  toolMetadataOf,
  TOOL_METADATA,
  type ArgsModel,
  type DescribedTool,
  type ToolArguments,
  type ToolContext,
  type ToolDefinition,
  type ToolImplementation,
  type ToolMetadata,
} from './tool-definition.js';

export { ToolRegistry, type ToolRegistryOptions } from './tool-registry.js';
