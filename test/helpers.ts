import type {
  ChatModelClient,
  CreateOptions,
  CreateResult,
  LLMMessage,
} from '../src/chatTypes.js';
import type { SendTaskRequest, SendTaskStreamingRequest, TaskSendParams } from '../src/a2aTypes.js';
import type { AgentStreamUpdate, ConversationalAgent } from '../src/WeatherAgent.js';

export type ScriptStep = CreateResult | ((messages: LLMMessage[]) => CreateResult);

/**
 * Model client that replays a fixed script, one step per `create` call, and
 * records what it was sent.
 */
export class ScriptedModelClient implements ChatModelClient {
  readonly calls: { messages: LLMMessage[]; options: CreateOptions }[] = [];
  private readonly steps: ScriptStep[];

  constructor(steps: ScriptStep[]) {
    this.steps = [...steps];
  }

  async create(messages: LLMMessage[], options: CreateOptions): Promise<CreateResult> {
    this.calls.push({ messages: [...messages], options });
    const step = this.steps.shift();
    if (step === undefined) {
      throw new Error('Scripted model client ran out of steps');
    }
    return typeof step === 'function' ? step(messages) : step;
  }
}

export function reply(content: string): CreateResult {
  return { content, toolCalls: [] };
}

export function callTool(name: string, args: Record<string, unknown>, id = 'call-1'): CreateResult {
  return { content: null, toolCalls: [{ id, name, arguments: JSON.stringify(args) }] };
}

/** Replies with the latest tool output followed by the stop phrase. */
export function echoLastToolResult(messages: LLMMessage[]): CreateResult {
  const tool = [...messages].reverse().find((message) => message.role === 'tool');
  return reply(`${tool?.content ?? 'no tool output'} TERMINATE`);
}

export class FakeAgent implements ConversationalAgent {
  readonly supportedContentTypes: readonly string[] = ['text', 'text/plain'];
  readonly invocations: { query: string; sessionId: string; signal?: AbortSignal }[] = [];

  constructor(
    private readonly answer: string | Error = 'It is sunny.',
    private readonly updates: (AgentStreamUpdate | Error)[] = []
  ) {}

  async invoke(query: string, sessionId: string, signal?: AbortSignal): Promise<string> {
    this.invocations.push({ query, sessionId, signal });
    if (this.answer instanceof Error) throw this.answer;
    return this.answer;
  }

  async *stream(query: string, sessionId: string, signal?: AbortSignal): AsyncGenerator<AgentStreamUpdate> {
    this.invocations.push({ query, sessionId, signal });
    for (const update of this.updates) {
      if (update instanceof Error) throw update;
      yield update;
    }
  }
}

export function progress(content: string): AgentStreamUpdate {
  return { isTaskComplete: false, requireUserInput: false, content };
}

export function done(content: string): AgentStreamUpdate {
  return { isTaskComplete: true, requireUserInput: false, content };
}

export function sendParams(overrides: Partial<TaskSendParams> = {}): TaskSendParams {
  return {
    id: 't1',
    sessionId: 's1',
    message: { role: 'user', parts: [{ type: 'text', text: "What's the weather in Tokyo?" }] },
    ...overrides,
  };
}

export function sendRequest(overrides: Partial<TaskSendParams> = {}): SendTaskRequest {
  return { jsonrpc: '2.0', id: 1, method: 'tasks/send', params: sendParams(overrides) };
}

export function subscribeRequest(overrides: Partial<TaskSendParams> = {}): SendTaskStreamingRequest {
  return { jsonrpc: '2.0', id: 1, method: 'tasks/sendSubscribe', params: sendParams(overrides) };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}
