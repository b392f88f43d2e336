import express, { type ErrorRequestHandler, type Express, type Request, type Response } from 'express';
import type { Server } from 'http';
import type { ZodType, ZodTypeDef } from 'zod';
import type {
  AgentCard,
  JsonRpcError,
  JsonRpcId,
  JsonRpcResponse,
  SendTaskStreamingResponse,
} from './a2aTypes.js';
import {
  jsonRpcRequestSchema,
  taskIdParamsSchema,
  taskPushNotificationConfigSchema,
  taskQueryParamsSchema,
  taskSendParamsSchema,
} from './a2aSchemas.js';
import {
  A2AError,
  errorMessage,
  internalError,
  invalidParamsError,
  invalidRequestError,
  jsonParseError,
  methodNotFoundError,
} from './errors.js';
import { isEventStream, type StreamingResult, type TaskManager } from './InMemoryTaskManager.js';
import { log } from './logger.js';

export interface A2AServerOptions {
  agentCard: AgentCard;
  taskManager: TaskManager;
  host?: string;
  port?: number;
  endpoint?: string;
}

export type DispatchResult =
  | { kind: 'response'; response: JsonRpcResponse }
  | { kind: 'stream'; id: JsonRpcId; events: AsyncIterable<SendTaskStreamingResponse> };

function parseParams<T>(schema: ZodType<T, ZodTypeDef, unknown>, params: unknown): T {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new A2AError(invalidParamsError('Invalid parameters', parsed.error.issues));
  }
  return parsed.data;
}

/**
 * JSON-RPC front for a task manager: serves the agent card and routes the
 * A2A task methods, answering subscriptions with Server-Sent Events.
 */
export class A2AServer {
  readonly app: Express;
  private readonly agentCard: AgentCard;
  private readonly taskManager: TaskManager;
  private readonly host: string;
  private readonly port: number;
  private readonly endpoint: string;

  constructor(options: A2AServerOptions) {
    this.agentCard = options.agentCard;
    this.taskManager = options.taskManager;
    this.host = options.host || 'localhost';
    this.port = options.port ?? 10000;
    this.endpoint = options.endpoint || '/';

    this.app = express();
    this.app.use(express.json());
    this.app.get('/.well-known/agent.json', (_req, res) => {
      res.json(this.agentCard);
    });
    this.app.post(this.endpoint, (req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        log.error('❌ Unhandled error while processing request:', error);
        if (!res.headersSent) {
          res.status(500).json({ jsonrpc: '2.0', id: null, error: internalError(errorMessage(error)) });
        } else {
          res.end();
        }
      });
    });
    this.app.use(this.jsonErrorHandler);
  }

  /**
   * Resolves once the server is listening; rejects when it cannot bind.
   */
  start(): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, this.host);
      server.once('error', reject);
      server.once('listening', () => {
        server.off('error', reject);
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        log.info(`✅ A2A server running on http://${this.host}:${port}${this.endpoint}`);
        log.info(`📋 Agent card: http://${this.host}:${port}/.well-known/agent.json`);
        resolve(server);
      });
    });
  }

  /**
   * Validates a decoded JSON-RPC body and hands it to the task manager.
   */
  async dispatch(body: unknown): Promise<DispatchResult> {
    const envelope = jsonRpcRequestSchema.safeParse(body);
    if (!envelope.success) {
      return this.errorResult(null, invalidRequestError(envelope.error.issues));
    }
    const { id, method, params } = envelope.data;

    try {
      switch (method) {
        case 'tasks/get':
          return this.respond(
            await this.taskManager.onGetTask({
              jsonrpc: '2.0',
              id,
              method,
              params: parseParams(taskQueryParamsSchema, params),
            })
          );
        case 'tasks/send':
          return this.respond(
            await this.taskManager.onSendTask({
              jsonrpc: '2.0',
              id,
              method,
              params: parseParams(taskSendParamsSchema, params),
            })
          );
        case 'tasks/sendSubscribe':
          return this.respondStreaming(
            id,
            await this.taskManager.onSendTaskSubscribe({
              jsonrpc: '2.0',
              id,
              method,
              params: parseParams(taskSendParamsSchema, params),
            })
          );
        case 'tasks/cancel':
          return this.respond(
            await this.taskManager.onCancelTask({
              jsonrpc: '2.0',
              id,
              method,
              params: parseParams(taskIdParamsSchema, params),
            })
          );
        case 'tasks/resubscribe':
          return this.respondStreaming(
            id,
            await this.taskManager.onResubscribeToTask({
              jsonrpc: '2.0',
              id,
              method,
              params: parseParams(taskQueryParamsSchema, params),
            })
          );
        case 'tasks/pushNotification/set':
          return this.respond(
            await this.taskManager.onSetTaskPushNotification({
              jsonrpc: '2.0',
              id,
              method,
              params: parseParams(taskPushNotificationConfigSchema, params),
            })
          );
        case 'tasks/pushNotification/get':
          return this.respond(
            await this.taskManager.onGetTaskPushNotification({
              jsonrpc: '2.0',
              id,
              method,
              params: parseParams(taskIdParamsSchema, params),
            })
          );
        default:
          log.warn(`Unexpected request method: ${method}`);
          return this.errorResult(id, methodNotFoundError(method));
      }
    } catch (error) {
      if (error instanceof A2AError) {
        return this.errorResult(id, error.error);
      }
      log.error(`❌ Error handling ${method}:`, error);
      return this.errorResult(id, internalError(errorMessage(error)));
    }
  }

  private async handleRequest(req: Request, res: Response): Promise<void> {
    const result = await this.dispatch(req.body);
    if (result.kind === 'response') {
      res.json(result.response);
      return;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    let closed = false;
    res.on('close', () => {
      closed = true;
    });

    try {
      for await (const event of result.events) {
        if (closed) break;
        res.write(`data: ${JSON.stringify(event)}\n\n`);
      }
    } catch (error) {
      log.error('❌ Error while streaming events:', error);
      if (!closed) {
        const failure: JsonRpcResponse = {
          jsonrpc: '2.0',
          id: result.id,
          error: internalError(errorMessage(error)),
        };
        res.write(`data: ${JSON.stringify(failure)}\n\n`);
      }
    } finally {
      res.end();
    }
  }

  private respond(response: JsonRpcResponse): DispatchResult {
    return { kind: 'response', response };
  }

  private respondStreaming(id: JsonRpcId, result: StreamingResult): DispatchResult {
    return isEventStream(result) ? { kind: 'stream', id, events: result } : this.respond(result);
  }

  private errorResult(id: JsonRpcId, error: JsonRpcError): DispatchResult {
    return { kind: 'response', response: { jsonrpc: '2.0', id, error } };
  }

  private readonly jsonErrorHandler: ErrorRequestHandler = (err, _req, res, next) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ jsonrpc: '2.0', id: null, error: jsonParseError(err.message) });
      return;
    }
    next(err);
  };
}
