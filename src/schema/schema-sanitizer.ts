import { isSchemaNode, mapChildren, type JSONSchema } from './json-schema.js';

/**
 * Keywords that describe the schema document rather than the arguments
 */
export const METADATA_KEYWORDS = ['$schema', '$id', 'title', '$defs', 'definitions'] as const;

const UNION_KEYWORDS = ['anyOf', 'oneOf'] as const;

function isNullSchema(value: unknown): boolean {
  return isSchemaNode(value) && value['type'] === 'null';
}

/**
 * Collapses `anyOf: [T, {type: 'null'}]` style unions to `T`.
 * Returns undefined when the node holds no such union.
 */
function collapseOptionalUnion(node: JSONSchema): JSONSchema | undefined {
  for (const keyword of UNION_KEYWORDS) {
    const branches = node[keyword];
    if (!Array.isArray(branches)) continue;

    const nonNull = branches.filter((branch: unknown) => !isNullSchema(branch));
    const [branch] = nonNull;
    if (nonNull.length !== 1 || !isSchemaNode(branch)) continue;

    // The enclosing node's own fields (its description above all) win
    const enclosing: JSONSchema = { ...node };
    delete enclosing[keyword];
    return { ...branch, ...enclosing };
  }
  return undefined;
}

/**
 * Reduces `type: ['string', 'null']` to `type: 'string'`
 */
function collapseNullableType(type: unknown): unknown {
  if (!Array.isArray(type) || type.length < 2) {
    return type;
  }
  const nonNull = type.filter((t: unknown) => t !== 'null');
  return nonNull.length === 1 ? nonNull[0] : type;
}

/**
 * Rewrites a schema tree into the shape tool manifests expect:
 * no document metadata at any depth, optional unions reduced to their
 * single branch, and every object closed to undeclared properties unless it
 * says otherwise. The input is left untouched.
 *
 * `sanitizeSchema(sanitizeSchema(x))` equals `sanitizeSchema(x)`.
 */
export function sanitizeSchema(schema: JSONSchema): JSONSchema {
  const node: JSONSchema = { ...schema };
  for (const keyword of METADATA_KEYWORDS) {
    delete node[keyword];
  }

  const collapsed = collapseOptionalUnion(node);
  if (collapsed) {
    return sanitizeSchema(collapsed);
  }

  if ('type' in node) {
    node['type'] = collapseNullableType(node['type']);
  }

  if (node['type'] === 'object' && !('additionalProperties' in node)) {
    node['additionalProperties'] = false;
  }

  return mapChildren(node, sanitizeSchema);
}
