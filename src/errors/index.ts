/**
 * Errors module
 */

export {
  ToolRelayError,
  ToolRegistrationError,
  ToolNotFoundError,
  ToolValidationError,
  SchemaDepthError,
  ToolExecutionError,
  ToolTimeoutError,
  RECOVERABLE_SYSTEM_ERROR_CODES,
  isRecoverableError,
  errorMessage,
} from './tool-errors.js';
