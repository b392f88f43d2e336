import type {
  Artifact,
  JsonRpcId,
  JsonRpcResponse,
  Message,
  Part,
  TaskState,
  TaskStatus,
  TextPart,
} from './a2aTypes.js';
import { contentTypeNotSupportedError, unsupportedOperationError } from './errors.js';

/**
 * A client that lists no accepted output modes takes anything, as does a
 * server that declares none.
 */
export function areModalitiesCompatible(
  clientModes: readonly string[] | undefined,
  serverModes: readonly string[] | undefined
): boolean {
  if (!clientModes || clientModes.length === 0) return true;
  if (!serverModes || serverModes.length === 0) return true;
  return clientModes.some((mode) => serverModes.includes(mode));
}

export function newIncompatibleTypesError(id: JsonRpcId): JsonRpcResponse<never> {
  return { jsonrpc: '2.0', id, error: contentTypeNotSupportedError() };
}

export function newNotImplementedError(id: JsonRpcId): JsonRpcResponse<never> {
  return { jsonrpc: '2.0', id, error: unsupportedOperationError() };
}

export function textPart(text: string): TextPart {
  return { type: 'text', text };
}

export function agentMessage(parts: Part[]): Message {
  return { role: 'agent', parts };
}

export function taskStatus(state: TaskState, message?: Message): TaskStatus {
  return message
    ? { state, message, timestamp: new Date().toISOString() }
    : { state, timestamp: new Date().toISOString() };
}

export function textArtifact(text: string, index = 0): Artifact {
  return { parts: [textPart(text)], index, append: false };
}
