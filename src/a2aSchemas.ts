import { randomUUID } from 'crypto';
import { z } from 'zod';
import type {
  Message,
  Part,
  TaskIdParams,
  TaskPushNotificationConfig,
  TaskQueryParams,
  TaskSendParams,
} from './a2aTypes.js';

const metadataSchema = z.record(z.unknown());

const textPartSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
  metadata: metadataSchema.optional(),
});

const filePartSchema = z.object({
  type: z.literal('file'),
  file: z
    .object({
      name: z.string().optional(),
      mimeType: z.string().optional(),
      bytes: z.string().optional(),
      uri: z.string().optional(),
    })
    .refine((file) => file.bytes !== undefined || file.uri !== undefined, {
      message: 'Either bytes or uri must be present in a file part',
    }),
  metadata: metadataSchema.optional(),
});

const dataPartSchema = z.object({
  type: z.literal('data'),
  data: z.record(z.unknown()),
  metadata: metadataSchema.optional(),
});

export const partSchema: z.ZodType<Part, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  textPartSchema,
  filePartSchema,
  dataPartSchema,
]);

export const messageSchema: z.ZodType<Message, z.ZodTypeDef, unknown> = z.object({
  role: z.enum(['user', 'agent']),
  parts: z.array(partSchema).min(1),
  metadata: metadataSchema.optional(),
});

export const taskSendParamsSchema: z.ZodType<TaskSendParams, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  sessionId: z.string().default(() => randomUUID().replace(/-/g, '')),
  message: messageSchema,
  acceptedOutputModes: z.array(z.string()).optional(),
  historyLength: z.number().int().nonnegative().optional(),
  metadata: metadataSchema.optional(),
});

export const taskQueryParamsSchema: z.ZodType<TaskQueryParams, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  historyLength: z.number().int().nonnegative().optional(),
  metadata: metadataSchema.optional(),
});

export const taskIdParamsSchema: z.ZodType<TaskIdParams, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  metadata: metadataSchema.optional(),
});

export const taskPushNotificationConfigSchema: z.ZodType<
  TaskPushNotificationConfig,
  z.ZodTypeDef,
  unknown
> = z.object({
  id: z.string().min(1),
  pushNotificationConfig: z.object({
    url: z.string().url(),
    token: z.string().optional(),
  }),
});

/**
 * Envelope check only; `params` is validated per method by the server.
 */
export const jsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).default(null),
  method: z.string(),
  params: z.unknown(),
});
