import { ToolRegistry } from '../../tools/tool-registry.js';
import type { OpenAITool } from './openai-types.js';

/**
 * Lists registered tools in the chat-completions `tools` format
 */
export class OpenAIToolRegistry extends ToolRegistry<OpenAITool[]> {
  manifest(): OpenAITool[] {
    return this.list().map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters ?? { type: 'object', properties: {}, additionalProperties: false },
      },
    }));
  }
}
