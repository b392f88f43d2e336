import { describe, expect, test } from 'vitest';
import { A2AServer, type DispatchResult } from '../src/A2AServer.js';
import type { JsonRpcResponse } from '../src/a2aTypes.js';
import { buildAgentCard } from '../src/agentCard.js';
import { ErrorCode } from '../src/errors.js';
import { WeatherTaskManager } from '../src/WeatherTaskManager.js';
import { FakeAgent, collect, done, progress } from './helpers.js';

function server(agent = new FakeAgent('Clear skies.', [progress('Processing...'), done('Finished')])): A2AServer {
  return new A2AServer({
    agentCard: buildAgentCard('localhost', 10000),
    taskManager: new WeatherTaskManager(agent),
  });
}

function response(result: DispatchResult): JsonRpcResponse {
  if (result.kind !== 'response') throw new Error('expected a plain response');
  return result.response;
}

const message = { role: 'user', parts: [{ type: 'text', text: 'Weather in Paris?' }] };

describe('A2AServer.dispatch', () => {
  test('tasks/send returns the completed task', async () => {
    const result = response(
      await server().dispatch({
        jsonrpc: '2.0',
        id: 7,
        method: 'tasks/send',
        params: { id: 'task-1', sessionId: 'session-1', message },
      })
    );

    expect(result.id).toBe(7);
    expect(result.result).toMatchObject({
      id: 'task-1',
      sessionId: 'session-1',
      status: { state: 'completed' },
      artifacts: [{ parts: [{ type: 'text', text: 'Clear skies.' }], index: 0, append: false }],
    });
  });

  test('fills in a session id when the client sends none', async () => {
    const result = response(
      await server().dispatch({ jsonrpc: '2.0', id: 1, method: 'tasks/send', params: { id: 'task-2', message } })
    );

    expect(result.result).toMatchObject({ sessionId: expect.stringMatching(/^[0-9a-f]{32}$/) });
  });

  test('tasks/sendSubscribe answers with an event stream', async () => {
    const result = await server().dispatch({
      jsonrpc: '2.0',
      id: 'sub-1',
      method: 'tasks/sendSubscribe',
      params: { id: 'task-3', sessionId: 's', message },
    });
    if (result.kind !== 'stream') throw new Error('expected a stream');

    const events = await collect(result.events);
    expect(result.id).toBe('sub-1');
    expect(events.map((event) => event.result && 'final' in event.result && event.result.final)).toEqual([
      false,
      true,
    ]);
  });

  test('tasks/get returns what tasks/send stored', async () => {
    const a2a = server();
    await a2a.dispatch({ jsonrpc: '2.0', id: 1, method: 'tasks/send', params: { id: 'task-4', message } });

    const result = response(
      await a2a.dispatch({ jsonrpc: '2.0', id: 2, method: 'tasks/get', params: { id: 'task-4', historyLength: 1 } })
    );

    expect(result.result).toMatchObject({ id: 'task-4', status: { state: 'completed' }, history: [message] });
  });

  test('rejects a body that is not a JSON-RPC request', async () => {
    const result = response(await server().dispatch({ hello: 'world' }));

    expect(result.id).toBeNull();
    expect(result.error?.code).toBe(ErrorCode.INVALID_REQUEST);
  });

  test('reports unknown methods', async () => {
    const result = response(await server().dispatch({ jsonrpc: '2.0', id: 3, method: 'tasks/launch', params: {} }));

    expect(result.error).toEqual({ code: ErrorCode.METHOD_NOT_FOUND, message: 'Method not found: tasks/launch' });
  });

  test('reports invalid params with the validation issues', async () => {
    const result = response(
      await server().dispatch({ jsonrpc: '2.0', id: 4, method: 'tasks/send', params: { id: 'task-5' } })
    );

    expect(result.error?.code).toBe(ErrorCode.INVALID_PARAMS);
    expect(result.error?.data).toEqual(
      expect.arrayContaining([expect.objectContaining({ path: ['message'] })])
    );
  });

  test('turns a non-text part into an invalid params error', async () => {
    const result = response(
      await server().dispatch({
        jsonrpc: '2.0',
        id: 5,
        method: 'tasks/send',
        params: { id: 'task-6', message: { role: 'user', parts: [{ type: 'file', file: { uri: 'file:///tmp/a.png' } }] } },
      })
    );

    expect(result.error).toEqual({
      code: ErrorCode.INVALID_PARAMS,
      message: 'Only text parts are supported',
    });
  });

  test('push notifications and resubscribe are not supported', async () => {
    const a2a = server();

    const push = response(
      await a2a.dispatch({
        jsonrpc: '2.0',
        id: 6,
        method: 'tasks/pushNotification/set',
        params: { id: 'task-7', pushNotificationConfig: { url: 'https://example.com/hook' } },
      })
    );
    const resubscribe = response(
      await a2a.dispatch({ jsonrpc: '2.0', id: 7, method: 'tasks/resubscribe', params: { id: 'task-7' } })
    );

    expect(push.error?.code).toBe(ErrorCode.PUSH_NOTIFICATION_NOT_SUPPORTED);
    expect(resubscribe.error?.code).toBe(ErrorCode.UNSUPPORTED_OPERATION);
  });
});

describe('buildAgentCard', () => {
  test('describes the weather skill and streaming support', () => {
    const card = buildAgentCard('0.0.0.0', 8080);

    expect(card.url).toBe('http://0.0.0.0:8080/');
    expect(card.capabilities.streaming).toBe(true);
    expect(card.defaultOutputModes).toEqual(['text', 'text/plain']);
    expect(card.skills.map((skill) => skill.id)).toEqual(['weather_information']);
    expect(card.skills[0]?.examples).toHaveLength(5);
  });
});
