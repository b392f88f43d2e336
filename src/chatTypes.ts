export interface FunctionCall {
  id: string;
  name: string;
  /** JSON-encoded arguments as produced by the model. */
  arguments: string;
}

export interface FunctionExecutionResult {
  callId: string;
  name: string;
  content: string;
  isError: boolean;
}

export interface TextMessage {
  type: 'text';
  source: string;
  content: string;
}

export interface ToolCallSummaryMessage {
  type: 'tool_call_summary';
  source: string;
  content: string;
}

/** Messages that take part in the conversation and count toward termination. */
export type ChatMessage = TextMessage | ToolCallSummaryMessage;

export interface ToolCallRequestEvent {
  type: 'tool_call_request';
  source: string;
  calls: FunctionCall[];
}

export interface ToolCallExecutionEvent {
  type: 'tool_call_execution';
  source: string;
  results: FunctionExecutionResult[];
}

export type AgentEvent = ToolCallRequestEvent | ToolCallExecutionEvent;

export interface TaskResult {
  type: 'result';
  messages: ChatMessage[];
  stopReason: string | null;
}

export type TeamStreamItem = ChatMessage | AgentEvent | TaskResult;

export function isChatMessage(item: TeamStreamItem): item is ChatMessage {
  return item.type === 'text' || item.type === 'tool_call_summary';
}

// Model-facing conversation

export type LLMMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls?: FunctionCall[] }
  | { role: 'tool'; toolCallId: string; content: string };

export interface ToolDefinition {
  name: string;
  description: string;
  /** JSON Schema for the tool arguments. */
  parameters: Record<string, unknown>;
}

export interface CreateResult {
  content: string | null;
  toolCalls: FunctionCall[];
}

export interface CreateOptions {
  tools: ToolDefinition[];
  signal?: AbortSignal;
}

export interface ChatModelClient {
  create(messages: LLMMessage[], options: CreateOptions): Promise<CreateResult>;
}
