/**
 * A JSON Schema node as plain JSON data.
 *
 * Schemas reach the engine from zod-to-json-schema, from callers handing in
 * pre-built definitions, and from arbitrary generated trees in tests, so the
 * engine treats them as untyped keyword maps and reads each keyword through
 * the accessors below.
 */
export interface JSONSchema {
  [keyword: string]: unknown;
}

/**
 * Keywords holding a single child schema
 */
export const SINGLE_CHILD_KEYWORDS = ['items', 'additionalProperties', 'not'] as const;

/**
 * Keywords holding a list of child schemas
 */
export const LIST_CHILD_KEYWORDS = ['anyOf', 'oneOf', 'allOf', 'prefixItems', 'items'] as const;

/**
 * Keywords that hold a name → schema map of definitions
 */
export const DEFINITION_KEYWORDS = ['$defs', 'definitions'] as const;

export function isSchemaNode(value: unknown): value is JSONSchema {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Returns the `properties` map of a node when it is well formed
 */
export function propertiesOf(node: JSONSchema): Record<string, JSONSchema> | undefined {
  const properties = node['properties'];
  if (!isSchemaNode(properties)) {
    return undefined;
  }
  const result: Record<string, JSONSchema> = {};
  for (const [name, child] of Object.entries(properties)) {
    if (isSchemaNode(child)) {
      result[name] = child;
    }
  }
  return result;
}

/**
 * Returns the string entries of a keyword such as `required`
 */
export function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Applies `visit` to every direct child schema of `node` and returns a new
 * node with the results in place. Non-schema keyword values (`enum`,
 * `default`, `const`, ...) are copied untouched.
 */
export function mapChildren(node: JSONSchema, visit: (child: JSONSchema) => JSONSchema): JSONSchema {
  const result: JSONSchema = { ...node };

  const properties = node['properties'];
  if (isSchemaNode(properties)) {
    const mapped: JSONSchema = {};
    for (const [name, child] of Object.entries(properties)) {
      mapped[name] = isSchemaNode(child) ? visit(child) : child;
    }
    result['properties'] = mapped;
  }

  for (const keyword of SINGLE_CHILD_KEYWORDS) {
    const child = node[keyword];
    if (isSchemaNode(child)) {
      result[keyword] = visit(child);
    }
  }

  for (const keyword of LIST_CHILD_KEYWORDS) {
    const list = node[keyword];
    if (Array.isArray(list)) {
      result[keyword] = list.map((child: unknown) => (isSchemaNode(child) ? visit(child) : child));
    }
  }

  return result;
}

/**
 * Lists the direct child schemas of `node`, in the order {@link mapChildren} visits them
 */
export function childrenOf(node: JSONSchema): JSONSchema[] {
  const children: JSONSchema[] = [];
  mapChildren(node, (child) => {
    children.push(child);
    return child;
  });
  return children;
}
