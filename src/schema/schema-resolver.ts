import { SchemaDepthError, ToolValidationError } from '../errors/tool-errors.js';
import { DEFINITION_KEYWORDS, childrenOf, isSchemaNode, mapChildren, type JSONSchema } from './json-schema.js';

/**
 * Default bound on schema nesting during reference inlining
 */
export const DEFAULT_MAX_SCHEMA_DEPTH = 20;

export interface ResolveOptions {
  /** Deepest node level inlining may produce; the root is level 0 */
  maxDepth?: number;
}

/**
 * Outgoing edge of the schema graph: a child, a definition, or the target
 * of a local reference
 */
interface Edge {
  node: JSONSchema;
  ref?: string;
}

/**
 * A node on the current path of the cycle-detection walk
 */
interface Frame {
  node: JSONSchema;
  ref?: string;
  pending: Edge[];
}

export function isLocalRef(ref: string): boolean {
  return ref.startsWith('#');
}

/**
 * Splits a local reference (`#`, `#/$defs/Name`, `#/properties/a/items`)
 * into unescaped JSON pointer segments
 */
function pointerSegments(ref: string): string[] | undefined {
  if (ref === '#' || ref === '#/') {
    return [];
  }
  if (!ref.startsWith('#/')) {
    return undefined;
  }
  try {
    return ref
      .slice(2)
      .split('/')
      .map((segment) => decodeURIComponent(segment).replace(/~1/g, '/').replace(/~0/g, '~'));
  } catch (error) {
    if (error instanceof URIError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Looks up the schema node a local reference points at
 */
export function resolvePointer(root: JSONSchema, ref: string): JSONSchema | undefined {
  const segments = pointerSegments(ref);
  if (segments === undefined) {
    return undefined;
  }

  let current: unknown = root;
  for (const segment of segments) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isSchemaNode(current)) {
      current = current[segment];
    } else {
      return undefined;
    }
  }

  return isSchemaNode(current) ? current : undefined;
}

function nearestRef(path: Frame[]): string {
  for (let i = path.length - 1; i >= 0; i--) {
    const ref = path[i]?.ref;
    if (ref !== undefined) return ref;
  }
  return '#';
}

function recursionError(ref: string): ToolValidationError {
  return new ToolValidationError(
    `Recursive structure detected: ${ref}. ` +
      'Recursive structures are not allowed in tool inputs. ' +
      'Use parent ids, lists, or a workflow loop instead.',
  );
}

function edgesOf(root: JSONSchema, node: JSONSchema): Edge[] {
  const edges: Edge[] = [];

  const ref = node['$ref'];
  if (typeof ref === 'string' && isLocalRef(ref)) {
    const target = resolvePointer(root, ref);
    if (target) {
      edges.push({ node: target, ref });
    }
  }

  for (const child of childrenOf(node)) {
    edges.push({ node: child });
  }
  for (const keyword of DEFINITION_KEYWORDS) {
    const table = node[keyword];
    if (isSchemaNode(table)) {
      for (const definition of Object.values(table).filter(isSchemaNode)) {
        edges.push({ node: definition });
      }
    }
  }

  return edges;
}

/**
 * Walks the schema graph, following local references, and fails when a node
 * is reached again while it is still on the current path. Reference targets
 * and objects that contain themselves are both covered, since either way the
 * path leads back to the same node.
 *
 * Depth-first with an explicit stack: a deep but acyclic schema must reach
 * the depth bound of {@link inlineRefs}, not the host call-stack limit.
 * Nodes whose subgraph is already known to be acyclic are not walked again,
 * so definitions shared by many paths cost one visit.
 *
 * @throws ToolValidationError when the graph contains a cycle
 */
export function assertNoRecursiveRefs(schema: JSONSchema): void {
  const onPath = new Set<JSONSchema>();
  const cleared = new Set<JSONSchema>();
  const path: Frame[] = [];

  const enter = (node: JSONSchema, ref?: string): void => {
    onPath.add(node);
    path.push({ node, ref, pending: edgesOf(schema, node).reverse() });
  };

  enter(schema);
  while (path.length > 0) {
    const frame = path[path.length - 1];
    if (!frame) break;

    const edge = frame.pending.pop();
    if (!edge) {
      path.pop();
      onPath.delete(frame.node);
      cleared.add(frame.node);
      continue;
    }

    if (cleared.has(edge.node)) {
      continue;
    }
    if (onPath.has(edge.node)) {
      throw recursionError(edge.ref ?? nearestRef(path));
    }
    enter(edge.node, edge.ref);
  }
}

function withoutDefinitions(node: JSONSchema): JSONSchema {
  const result: JSONSchema = { ...node };
  for (const keyword of DEFINITION_KEYWORDS) {
    delete result[keyword];
  }
  return result;
}

/**
 * Replaces every local `$ref` with the fields of its target and drops the
 * definition tables. Fields already on the referencing node are kept.
 *
 * @throws SchemaDepthError when nesting goes beyond `maxDepth`
 * @throws ToolValidationError for references that cannot be inlined
 */
export function inlineRefs(schema: JSONSchema, options: ResolveOptions = {}): JSONSchema {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_SCHEMA_DEPTH;

  const depthError = (): SchemaDepthError =>
    new SchemaDepthError(
      `Schema nesting exceeds the maximum depth of ${maxDepth}. Flatten the parameter structure.`,
      maxDepth,
    );

  const visit = (node: JSONSchema, depth: number): JSONSchema => {
    if (depth > maxDepth) {
      throw depthError();
    }

    let current = node;
    let expansions = 0;
    for (let ref = current['$ref']; typeof ref === 'string'; ref = current['$ref']) {
      if (!isLocalRef(ref)) {
        throw new ToolValidationError(`External schema reference '${ref}' cannot be inlined.`);
      }
      const target = resolvePointer(schema, ref);
      if (!target) {
        throw new ToolValidationError(`Schema reference '${ref}' does not resolve to a definition.`);
      }

      const own: JSONSchema = { ...current };
      delete own['$ref'];
      current = { ...target, ...own };

      // Reference chains (A -> B -> C) share the depth budget
      expansions += 1;
      if (expansions > maxDepth) {
        throw depthError();
      }
    }

    return mapChildren(withoutDefinitions(current), (child) => visit(child, depth + 1));
  };

  return visit(schema, 0);
}

/**
 * Cycle check followed by inlining
 */
export function resolveSchema(schema: JSONSchema, options: ResolveOptions = {}): JSONSchema {
  assertNoRecursiveRefs(schema);
  return inlineRefs(schema, options);
}
