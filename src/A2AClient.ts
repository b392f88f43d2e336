import { randomUUID } from 'crypto';
import type {
  AgentCard,
  JsonRpcError,
  SendTaskStreamingResponse,
  Task,
  TaskIdParams,
  TaskQueryParams,
  TaskSendParams,
} from './a2aTypes.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class A2AClientError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly rpcError?: JsonRpcError
  ) {
    super(message);
    this.name = 'A2AClientError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Minimal JSON-RPC client for an A2A agent.
 */
export class A2AClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(baseUrl: string, fetchImpl: FetchLike = fetch) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.fetchImpl = fetchImpl;
  }

  async getAgentCard(): Promise<AgentCard> {
    const response = await this.fetchImpl(`${this.baseUrl}/.well-known/agent.json`);
    if (!response.ok) {
      throw new A2AClientError(`Failed to fetch agent card (${response.status})`, response.status);
    }
    return (await response.json()) as AgentCard;
  }

  async sendTask(params: TaskSendParams): Promise<Task> {
    return this.call<Task>('tasks/send', params);
  }

  async getTask(params: TaskQueryParams): Promise<Task> {
    return this.call<Task>('tasks/get', params);
  }

  async cancelTask(params: TaskIdParams): Promise<Task> {
    return this.call<Task>('tasks/cancel', params);
  }

  /**
   * Yields each SSE event of a `tasks/sendSubscribe` call. A JSON-RPC error
   * answered without a stream is thrown.
   */
  async *sendTaskSubscribe(
    params: TaskSendParams
  ): AsyncGenerator<SendTaskStreamingResponse, void, undefined> {
    const response = await this.post('tasks/sendSubscribe', params, 'text/event-stream');
    const contentType = response.headers.get('content-type') ?? '';

    if (!contentType.includes('text/event-stream')) {
      this.unwrap(await response.json());
      throw new A2AClientError('Expected an event stream', response.status);
    }
    if (!response.body) {
      throw new A2AClientError('Event stream has no body', response.status);
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });
      let boundary = buffer.indexOf('\n\n');
      while (boundary !== -1) {
        const event = parseSseEvent(buffer.slice(0, boundary));
        buffer = buffer.slice(boundary + 2);
        if (event !== null) yield event;
        boundary = buffer.indexOf('\n\n');
      }
    }
    const rest = parseSseEvent(buffer);
    if (rest !== null) yield rest;
  }

  private async call<T>(method: string, params: unknown): Promise<T> {
    const response = await this.post(method, params, 'application/json');
    const body: unknown = await response.json();
    return this.unwrap(body) as T;
  }

  private async post(method: string, params: unknown, accept: string): Promise<Response> {
    const response = await this.fetchImpl(`${this.baseUrl}/`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: accept,
      },
      body: JSON.stringify({ jsonrpc: '2.0', id: randomUUID(), method, params }),
    });

    if (!response.ok && response.status !== 400) {
      const text = await response.text();
      throw new A2AClientError(
        `Request ${method} failed (${response.status}): ${text || response.statusText}`,
        response.status
      );
    }
    return response;
  }

  private unwrap(body: unknown): unknown {
    if (!isRecord(body)) {
      throw new A2AClientError('Response is not a JSON-RPC object');
    }
    const error = body.error;
    if (isRecord(error) && typeof error.code === 'number' && typeof error.message === 'string') {
      throw new A2AClientError(error.message, undefined, {
        code: error.code,
        message: error.message,
        data: error.data,
      });
    }
    return body.result;
  }
}

/** Parses one SSE block; returns null when it carries no `data:` lines. */
export function parseSseEvent(block: string): SendTaskStreamingResponse | null {
  const data = block
    .split(/\r?\n/)
    .filter((line) => line.startsWith('data:'))
    .map((line) => line.slice(5).trimStart())
    .join('\n');
  if (data === '') return null;
  return JSON.parse(data) as SendTaskStreamingResponse;
}

export function newTaskParams(text: string, sessionId: string = randomUUID()): TaskSendParams {
  return {
    id: randomUUID(),
    sessionId,
    acceptedOutputModes: ['text'],
    message: { role: 'user', parts: [{ type: 'text', text }] },
  };
}
