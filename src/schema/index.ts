/**
 * Schema engine: introspection, reference resolution and sanitization
 */

export { type JSONSchema, isSchemaNode, mapChildren, propertiesOf, stringList } from './json-schema.js';
export {
  introspect,
  type IntrospectedTool,
  type IntrospectOptions,
} from './parameter-introspector.js';
export {
  assertNoRecursiveRefs,
  inlineRefs,
  resolveSchema,
  resolvePointer,
  DEFAULT_MAX_SCHEMA_DEPTH,
  type ResolveOptions,
} from './schema-resolver.js';
export { sanitizeSchema, METADATA_KEYWORDS } from './schema-sanitizer.js';
