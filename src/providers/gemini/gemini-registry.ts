import { mapChildren, propertiesOf, stringList, type JSONSchema } from '../../schema/json-schema.js';
import type { ToolDefinition } from '../../tools/tool-definition.js';
import { ToolRegistry } from '../../tools/tool-registry.js';
import type { GeminiFunctionDeclaration, GeminiTool } from './gemini-types.js';

/**
 * Adapts a sanitized schema to what function declarations accept:
 * `additionalProperties` is dropped at every depth and `required` only
 * names declared properties, disappearing when none are left.
 */
export function toGeminiSchema(schema: JSONSchema): JSONSchema {
  const node: JSONSchema = { ...schema };
  delete node['additionalProperties'];

  const properties = propertiesOf(node);
  const required = stringList(node['required']);
  if (properties && required) {
    const declared = required.filter((name) => Object.hasOwn(properties, name));
    if (declared.length > 0) {
      node['required'] = declared;
    } else {
      delete node['required'];
    }
  }

  return mapChildren(node, toGeminiSchema);
}

/**
 * Lists registered tools as one Gemini tool holding a function declaration
 * per registered tool
 */
export class GeminiToolRegistry extends ToolRegistry<GeminiTool | undefined> {
  manifest(): GeminiTool | undefined {
    if (this.size === 0) {
      return undefined;
    }
    return { functionDeclarations: this.list().map(declare) };
  }
}

function declare(tool: ToolDefinition): GeminiFunctionDeclaration {
  const properties = tool.parameters && propertiesOf(tool.parameters);
  // Object schemas without properties are rejected, so parameterless tools omit the schema
  if (!tool.parameters || !properties || Object.keys(properties).length === 0) {
    return { name: tool.name, description: tool.description };
  }
  return { name: tool.name, description: tool.description, parameters: toGeminiSchema(tool.parameters) };
}
