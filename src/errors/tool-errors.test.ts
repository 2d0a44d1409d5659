import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  isRecoverableError,
  SchemaDepthError,
  ToolExecutionError,
  ToolTimeoutError,
  ToolValidationError,
} from './tool-errors.js';

describe('isRecoverableError', () => {
  it('should accept the recoverable error kinds', () => {
    const zodError = z.object({ a: z.number() }).safeParse({ a: 'x' });
    if (zodError.success) throw new Error('expected a validation failure');

    expect(isRecoverableError(new ToolExecutionError('failed'))).toBe(true);
    expect(isRecoverableError(new ToolTimeoutError(1000))).toBe(true);
    expect(isRecoverableError(new ToolValidationError('invalid'))).toBe(true);
    expect(isRecoverableError(new TypeError('wrong type'))).toBe(true);
    expect(isRecoverableError(new RangeError('out of range'))).toBe(true);
    expect(isRecoverableError(zodError.error)).toBe(true);
    expect(isRecoverableError(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe(true);
  });

  it('should treat a plain Error as fatal', () => {
    expect(isRecoverableError(new Error('bad input'))).toBe(false);
    expect(isRecoverableError(Object.assign(new Error('refused'), { code: 'ECONNREFUSED' }))).toBe(false);
    expect(isRecoverableError('not an error')).toBe(false);
  });
});

describe('tool errors', () => {
  it('should name errors after their class', () => {
    expect(new SchemaDepthError('too deep', 3).name).toBe('SchemaDepthError');
    expect(new ToolTimeoutError(1500).message).toBe('Tool execution timed out after 1.5 seconds.');
  });
});
