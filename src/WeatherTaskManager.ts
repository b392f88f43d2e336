import type {
  JsonRpcResponse,
  SendTaskRequest,
  SendTaskResponse,
  SendTaskStreamingRequest,
  SendTaskStreamingResponse,
  TaskSendParams,
} from './a2aTypes.js';
import { TaskState } from './a2aTypes.js';
import {
  A2AError,
  TaskNotFoundError,
  errorMessage,
  internalError,
  invalidParamsError,
} from './errors.js';
import { InMemoryTaskManager, type StreamingResult } from './InMemoryTaskManager.js';
import { log } from './logger.js';
import {
  agentMessage,
  areModalitiesCompatible,
  newIncompatibleTypesError,
  taskStatus,
  textArtifact,
  textPart,
} from './utils.js';
import type { ConversationalAgent } from './WeatherAgent.js';

export interface WeatherTaskManagerOptions {
  /** Abort each agent call after this many milliseconds. */
  timeoutMs?: number | null;
}

/**
 * Bridges A2A task requests to a conversational agent: one-shot sends become
 * a single completed task, subscriptions become a stream of status updates.
 */
export class WeatherTaskManager extends InMemoryTaskManager {
  private readonly agent: ConversationalAgent;
  private readonly timeoutMs: number | null;

  constructor(agent: ConversationalAgent, options: WeatherTaskManagerOptions = {}) {
    super();
    this.agent = agent;
    this.timeoutMs = options.timeoutMs ?? null;
  }

  async onSendTask(request: SendTaskRequest): Promise<SendTaskResponse> {
    const error = this.validateRequest(request);
    if (error) return error;

    const query = this.getUserQuery(request.params);
    await this.upsertTask(request.params);
    return this.invoke(request, query);
  }

  async onSendTaskSubscribe(request: SendTaskStreamingRequest): Promise<StreamingResult> {
    const error = this.validateRequest(request);
    if (error) return error;

    const query = this.getUserQuery(request.params);
    await this.upsertTask(request.params);
    return this.streamGenerator(request, query);
  }

  validateRequest(
    request: SendTaskRequest | SendTaskStreamingRequest
  ): JsonRpcResponse<never> | null {
    const { acceptedOutputModes } = request.params;
    if (!areModalitiesCompatible(acceptedOutputModes, this.agent.supportedContentTypes)) {
      log.warn(
        `Unsupported output mode. Received ${JSON.stringify(acceptedOutputModes)}, ` +
          `Support ${JSON.stringify(this.agent.supportedContentTypes)}`
      );
      return newIncompatibleTypesError(request.id);
    }
    return null;
  }

  getUserQuery(params: TaskSendParams): string {
    const part = params.message.parts[0];
    if (!part || part.type !== 'text') {
      throw new A2AError(invalidParamsError('Only text parts are supported'));
    }
    return part.text;
  }

  private async invoke(request: SendTaskRequest, query: string): Promise<SendTaskResponse> {
    const { id, sessionId, historyLength } = request.params;

    try {
      await this.updateStore(id, taskStatus(TaskState.WORKING));

      const content = await this.agent.invoke(query, sessionId, this.createSignal());

      const task = await this.updateStore(
        id,
        taskStatus(TaskState.COMPLETED, agentMessage([textPart(content)])),
        [textArtifact(content)]
      );
      const result =
        historyLength === undefined ? structuredClone(task) : this.snapshot(task, historyLength);
      return { jsonrpc: '2.0', id: request.id, result };
    } catch (error) {
      if (error instanceof TaskNotFoundError) throw error;

      const message = `Error invoking agent: ${errorMessage(error)}`;
      log.error(message);
      await this.updateStore(id, taskStatus(TaskState.FAILED, agentMessage([textPart(message)])));
      return { jsonrpc: '2.0', id: request.id, error: internalError(message) };
    }
  }

  private async *streamGenerator(
    request: SendTaskStreamingRequest,
    query: string
  ): AsyncGenerator<SendTaskStreamingResponse, void, undefined> {
    const { id, sessionId } = request.params;
    let settled = false;

    try {
      for await (const item of this.agent.stream(query, sessionId, this.createSignal())) {
        const parts = [textPart(item.content)];
        const state = item.isTaskComplete ? TaskState.COMPLETED : TaskState.WORKING;
        const status = taskStatus(state, agentMessage(parts));

        if (item.isTaskComplete) {
          await this.updateStore(id, status, [textArtifact(item.content)]);
          settled = true;
        } else {
          await this.updateStore(id, status);
        }

        yield {
          jsonrpc: '2.0',
          id: request.id,
          result: { id, status, final: item.isTaskComplete },
        };

        if (item.isTaskComplete) return;
      }
    } catch (error) {
      settled = true;
      if (error instanceof TaskNotFoundError) throw error;

      log.error(`An error occurred while streaming the response: ${errorMessage(error)}`);
      await this.updateStore(
        id,
        taskStatus(TaskState.FAILED, agentMessage([textPart(errorMessage(error))]))
      );
      yield {
        jsonrpc: '2.0',
        id: request.id,
        error: internalError('An error occurred while streaming the response'),
      };
    } finally {
      // consumer went away (or the agent stopped) before a final update
      if (!settled) {
        log.warn(`Stream for task ${id} closed before completion`);
        await this.updateStore(
          id,
          taskStatus(
            TaskState.CANCELED,
            agentMessage([textPart('Stream closed before the task completed')])
          )
        );
      }
    }
  }

  private createSignal(): AbortSignal | undefined {
    return this.timeoutMs === null ? undefined : AbortSignal.timeout(this.timeoutMs);
  }
}
