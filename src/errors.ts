import type { JsonRpcError } from './a2aTypes.js';

export const ErrorCode = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  TASK_NOT_FOUND: -32001,
  TASK_NOT_CANCELABLE: -32002,
  PUSH_NOTIFICATION_NOT_SUPPORTED: -32003,
  UNSUPPORTED_OPERATION: -32004,
  CONTENT_TYPE_NOT_SUPPORTED: -32005,
} as const;

export function jsonParseError(data?: unknown): JsonRpcError {
  return { code: ErrorCode.PARSE_ERROR, message: 'Invalid JSON payload', data };
}

export function invalidRequestError(data?: unknown): JsonRpcError {
  return { code: ErrorCode.INVALID_REQUEST, message: 'Request payload validation error', data };
}

export function methodNotFoundError(method: string): JsonRpcError {
  return { code: ErrorCode.METHOD_NOT_FOUND, message: `Method not found: ${method}` };
}

export function invalidParamsError(message = 'Invalid parameters', data?: unknown): JsonRpcError {
  return { code: ErrorCode.INVALID_PARAMS, message, data };
}

export function internalError(message = 'Internal error'): JsonRpcError {
  return { code: ErrorCode.INTERNAL_ERROR, message };
}

export function taskNotFoundError(): JsonRpcError {
  return { code: ErrorCode.TASK_NOT_FOUND, message: 'Task not found' };
}

export function taskNotCancelableError(): JsonRpcError {
  return { code: ErrorCode.TASK_NOT_CANCELABLE, message: 'Task cannot be canceled' };
}

export function pushNotificationNotSupportedError(): JsonRpcError {
  return {
    code: ErrorCode.PUSH_NOTIFICATION_NOT_SUPPORTED,
    message: 'Push Notification is not supported',
  };
}

export function unsupportedOperationError(): JsonRpcError {
  return { code: ErrorCode.UNSUPPORTED_OPERATION, message: 'This operation is not supported' };
}

export function contentTypeNotSupportedError(): JsonRpcError {
  return { code: ErrorCode.CONTENT_TYPE_NOT_SUPPORTED, message: 'Incompatible content types' };
}

/**
 * Thrown inside request handling to short-circuit with a protocol error.
 * The server turns it into the `error` member of the JSON-RPC response.
 */
export class A2AError extends Error {
  constructor(readonly error: JsonRpcError) {
    super(error.message);
    this.name = 'A2AError';
  }
}

/**
 * An update was attempted on a task id that was never upserted.
 */
export class TaskNotFoundError extends Error {
  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

export class MissingApiKeyError extends Error {
  constructor(message = 'OPENAI_API_KEY environment variable not set.') {
    super(message);
    this.name = 'MissingApiKeyError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
