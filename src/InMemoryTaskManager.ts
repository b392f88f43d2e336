import type {
  Artifact,
  CancelTaskRequest,
  CancelTaskResponse,
  GetTaskPushNotificationRequest,
  GetTaskRequest,
  GetTaskResponse,
  JsonRpcResponse,
  SendTaskRequest,
  SendTaskResponse,
  SendTaskStreamingRequest,
  SendTaskStreamingResponse,
  SetTaskPushNotificationRequest,
  Task,
  TaskPushNotificationResponse,
  TaskResubscriptionRequest,
  TaskSendParams,
  TaskStatus,
} from './a2aTypes.js';
import { TaskState } from './a2aTypes.js';
import {
  TaskNotFoundError,
  pushNotificationNotSupportedError,
  taskNotCancelableError,
  taskNotFoundError,
} from './errors.js';
import { KeyedMutex } from './KeyedMutex.js';
import { log } from './logger.js';
import { newNotImplementedError, taskStatus } from './utils.js';

export type StreamingResult = AsyncIterable<SendTaskStreamingResponse> | JsonRpcResponse<never>;

export function isEventStream(
  result: StreamingResult
): result is AsyncIterable<SendTaskStreamingResponse> {
  return Symbol.asyncIterator in result;
}

export interface TaskManager {
  onGetTask(request: GetTaskRequest): Promise<GetTaskResponse>;
  onCancelTask(request: CancelTaskRequest): Promise<CancelTaskResponse>;
  onSendTask(request: SendTaskRequest): Promise<SendTaskResponse>;
  onSendTaskSubscribe(request: SendTaskStreamingRequest): Promise<StreamingResult>;
  onResubscribeToTask(request: TaskResubscriptionRequest): Promise<StreamingResult>;
  onSetTaskPushNotification(
    request: SetTaskPushNotificationRequest
  ): Promise<TaskPushNotificationResponse>;
  onGetTaskPushNotification(
    request: GetTaskPushNotificationRequest
  ): Promise<TaskPushNotificationResponse>;
}

/**
 * Keeps tasks in a process-lifetime map. Every read-modify-write on a task
 * runs under that task's own lock, so updates to different tasks never wait
 * on each other.
 */
export abstract class InMemoryTaskManager implements TaskManager {
  protected readonly tasks = new Map<string, Task>();
  protected readonly locks = new KeyedMutex();

  abstract onSendTask(request: SendTaskRequest): Promise<SendTaskResponse>;
  abstract onSendTaskSubscribe(request: SendTaskStreamingRequest): Promise<StreamingResult>;

  async onGetTask(request: GetTaskRequest): Promise<GetTaskResponse> {
    const { id, historyLength } = request.params;
    log.debug(`Getting task ${id}`);

    const task = this.tasks.get(id);
    if (!task) {
      return { jsonrpc: '2.0', id: request.id, error: taskNotFoundError() };
    }
    return { jsonrpc: '2.0', id: request.id, result: this.snapshot(task, historyLength) };
  }

  async onCancelTask(request: CancelTaskRequest): Promise<CancelTaskResponse> {
    if (!this.tasks.has(request.params.id)) {
      return { jsonrpc: '2.0', id: request.id, error: taskNotFoundError() };
    }
    return { jsonrpc: '2.0', id: request.id, error: taskNotCancelableError() };
  }

  async onResubscribeToTask(request: TaskResubscriptionRequest): Promise<StreamingResult> {
    return newNotImplementedError(request.id);
  }

  async onSetTaskPushNotification(
    request: SetTaskPushNotificationRequest
  ): Promise<TaskPushNotificationResponse> {
    return { jsonrpc: '2.0', id: request.id, error: pushNotificationNotSupportedError() };
  }

  async onGetTaskPushNotification(
    request: GetTaskPushNotificationRequest
  ): Promise<TaskPushNotificationResponse> {
    return { jsonrpc: '2.0', id: request.id, error: pushNotificationNotSupportedError() };
  }

  /**
   * Creates the task on first sight of its id; later sends append their
   * message to the existing task's history.
   */
  protected async upsertTask(params: TaskSendParams): Promise<Task> {
    log.debug(`Upserting task ${params.id}`);
    return this.locks.runExclusive(params.id, () => {
      const existing = this.tasks.get(params.id);
      if (existing) {
        existing.history = [...(existing.history ?? []), params.message];
        return existing;
      }

      const task: Task = {
        id: params.id,
        sessionId: params.sessionId,
        status: taskStatus(TaskState.SUBMITTED),
        history: [params.message],
        ...(params.metadata ? { metadata: params.metadata } : {}),
      };
      this.tasks.set(params.id, task);
      return task;
    });
  }

  /**
   * Overwrites the task's status and appends any artifacts.
   * Throws TaskNotFoundError when the id was never upserted.
   */
  async updateStore(taskId: string, status: TaskStatus, artifacts?: Artifact[]): Promise<Task> {
    return this.locks.runExclusive(taskId, () => {
      const task = this.tasks.get(taskId);
      if (!task) {
        log.error(`Task ${taskId} not found for updating the task`);
        throw new TaskNotFoundError(taskId);
      }

      task.status = status;
      if (artifacts !== undefined) {
        task.artifacts = [...(task.artifacts ?? []), ...artifacts];
      }
      return task;
    });
  }

  /** Copy of the task with history cut to the last `historyLength` messages. */
  protected snapshot(task: Task, historyLength?: number): Task {
    const copy = structuredClone(task);
    const history = copy.history ?? [];
    copy.history = historyLength && historyLength > 0 ? history.slice(-historyLength) : [];
    return copy;
  }
}
