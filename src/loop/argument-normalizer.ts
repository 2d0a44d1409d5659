import { ToolExecutionError } from '../errors/tool-errors.js';
import type { ToolArguments } from '../tools/tool-definition.js';

function isPlainObject(value: unknown): value is ToolArguments {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return value !== null && typeof value === 'object' && Symbol.iterator in value;
}

function fromEntries(entries: Iterable<unknown>): ToolArguments {
  const args: ToolArguments = {};
  for (const entry of entries) {
    if (!Array.isArray(entry) || entry.length !== 2 || typeof entry[0] !== 'string') {
      throw new ToolExecutionError('Function arguments must be key/value pairs with string keys.');
    }
    args[entry[0]] = entry[1];
  }
  return args;
}

/**
 * Turns the arguments of a tool call, in whatever form the provider sent
 * them, into a plain argument object.
 *
 * - `undefined`, `null` and `''` mean no arguments
 * - strings are decoded as JSON; a decoded `null` means no arguments
 * - a `Map` or any iterable of `[key, value]` pairs becomes an object
 *
 * @throws SyntaxError when a string is not valid JSON
 * @throws ToolExecutionError for every other shape
 */
export function normalizeArguments(raw: unknown): ToolArguments {
  if (raw === undefined || raw === null || raw === '') {
    return {};
  }

  if (typeof raw === 'string') {
    const decoded: unknown = JSON.parse(raw);
    if (decoded === null) {
      return {};
    }
    if (!isPlainObject(decoded)) {
      throw new ToolExecutionError('Function arguments must decode to a JSON object.');
    }
    return decoded;
  }

  if (isPlainObject(raw)) {
    return raw;
  }

  if (raw instanceof Map || isIterable(raw)) {
    return fromEntries(raw instanceof Map ? raw.entries() : raw);
  }

  throw new ToolExecutionError(`Unsupported function arguments of type ${typeof raw}.`);
}
