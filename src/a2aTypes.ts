export enum TaskState {
  SUBMITTED = 'submitted',
  WORKING = 'working',
  INPUT_REQUIRED = 'input-required',
  COMPLETED = 'completed',
  CANCELED = 'canceled',
  FAILED = 'failed',
  UNKNOWN = 'unknown',
}

export interface TextPart {
  type: 'text';
  text: string;
  metadata?: Record<string, unknown>;
}

export interface FileContent {
  name?: string;
  mimeType?: string;
  bytes?: string;
  uri?: string;
}

export interface FilePart {
  type: 'file';
  file: FileContent;
  metadata?: Record<string, unknown>;
}

export interface DataPart {
  type: 'data';
  data: Record<string, unknown>;
  metadata?: Record<string, unknown>;
}

export type Part = TextPart | FilePart | DataPart;

export interface Message {
  role: 'user' | 'agent';
  parts: Part[];
  metadata?: Record<string, unknown>;
}

export interface TaskStatus {
  state: TaskState;
  message?: Message;
  timestamp: string;
}

export interface Artifact {
  name?: string;
  description?: string;
  parts: Part[];
  index: number;
  append?: boolean;
  lastChunk?: boolean;
  metadata?: Record<string, unknown>;
}

export interface Task {
  id: string;
  sessionId: string;
  status: TaskStatus;
  artifacts?: Artifact[];
  history?: Message[];
  metadata?: Record<string, unknown>;
}

export interface TaskStatusUpdateEvent {
  id: string;
  status: TaskStatus;
  final: boolean;
  metadata?: Record<string, unknown>;
}

export interface TaskArtifactUpdateEvent {
  id: string;
  artifact: Artifact;
  metadata?: Record<string, unknown>;
}

export interface TaskSendParams {
  id: string;
  sessionId: string;
  message: Message;
  acceptedOutputModes?: string[];
  historyLength?: number;
  metadata?: Record<string, unknown>;
}

export interface TaskQueryParams {
  id: string;
  historyLength?: number;
  metadata?: Record<string, unknown>;
}

export interface TaskIdParams {
  id: string;
  metadata?: Record<string, unknown>;
}

export interface PushNotificationConfig {
  url: string;
  token?: string;
}

export interface TaskPushNotificationConfig {
  id: string;
  pushNotificationConfig: PushNotificationConfig;
}

// JSON-RPC envelope

export type JsonRpcId = string | number | null;

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcResponse<R = unknown> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result?: R;
  error?: JsonRpcError;
}

interface JsonRpcRequest<M extends string, P> {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: M;
  params: P;
}

export type SendTaskRequest = JsonRpcRequest<'tasks/send', TaskSendParams>;
export type SendTaskStreamingRequest = JsonRpcRequest<'tasks/sendSubscribe', TaskSendParams>;
export type GetTaskRequest = JsonRpcRequest<'tasks/get', TaskQueryParams>;
export type CancelTaskRequest = JsonRpcRequest<'tasks/cancel', TaskIdParams>;
export type TaskResubscriptionRequest = JsonRpcRequest<'tasks/resubscribe', TaskQueryParams>;
export type SetTaskPushNotificationRequest = JsonRpcRequest<
  'tasks/pushNotification/set',
  TaskPushNotificationConfig
>;
export type GetTaskPushNotificationRequest = JsonRpcRequest<
  'tasks/pushNotification/get',
  TaskIdParams
>;

export type A2ARequest =
  | SendTaskRequest
  | SendTaskStreamingRequest
  | GetTaskRequest
  | CancelTaskRequest
  | TaskResubscriptionRequest
  | SetTaskPushNotificationRequest
  | GetTaskPushNotificationRequest;

export type SendTaskResponse = JsonRpcResponse<Task>;
export type GetTaskResponse = JsonRpcResponse<Task>;
export type CancelTaskResponse = JsonRpcResponse<Task>;
export type TaskPushNotificationResponse = JsonRpcResponse<TaskPushNotificationConfig>;
export type SendTaskStreamingResponse = JsonRpcResponse<
  TaskStatusUpdateEvent | TaskArtifactUpdateEvent
>;

// Agent card served at /.well-known/agent.json

export interface AgentCapabilities {
  streaming: boolean;
  pushNotifications: boolean;
  stateTransitionHistory: boolean;
}

export interface AgentSkill {
  id: string;
  name: string;
  description?: string;
  tags?: string[];
  examples?: string[];
  inputModes?: string[];
  outputModes?: string[];
}

export interface AgentCard {
  name: string;
  description?: string;
  url: string;
  version: string;
  capabilities: AgentCapabilities;
  defaultInputModes: string[];
  defaultOutputModes: string[];
  skills: AgentSkill[];
}
