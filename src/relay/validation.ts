import { z } from 'zod';

import { ValidationError } from './errors.js';
import { collectPartsText } from './parts.js';
import { TERMINAL_STATES, type TaskStatusEvent } from './types.js';

// Part types - only text is rendered, file and data are accepted and skipped
export const TextPartSchema = z.object({ kind: z.literal('text'), text: z.string() }).passthrough();
export const FilePartSchema = z.object({ kind: z.literal('file') }).passthrough();
export const DataPartSchema = z.object({ kind: z.literal('data') }).passthrough();

export const PartSchema = z.discriminatedUnion('kind', [
  TextPartSchema,
  FilePartSchema,
  DataPartSchema,
]);

export const StatusMessageSchema = z
  .object({
    kind: z.literal('message').optional(),
    parts: z.array(PartSchema),
  })
  .passthrough();

// Task status types - matches SDK TaskState
export const TaskStateSchema = z.enum([
  'submitted',
  'working',
  'input-required',
  'auth-required',
  'completed',
  'failed',
  'canceled',
  'rejected',
  'unknown',
]);

export const TaskStatusSchema = z.object({
  state: TaskStateSchema,
  message: z.union([z.string(), StatusMessageSchema]).optional(),
  timestamp: z.string().optional(),
});

// A2A status-update event
export const TaskStatusUpdateEventSchema = z.object({
  kind: z.literal('status-update'),
  taskId: z.string().min(1),
  contextId: z.string().optional(),
  status: TaskStatusSchema,
  final: z.boolean(),
});

// Full task object, as pushed by A2A servers that notify with the task itself
export const TaskSnapshotSchema = z
  .object({
    kind: z.literal('task'),
    id: z.string().min(1),
    contextId: z.string().optional(),
    status: TaskStatusSchema,
  })
  .passthrough();

// Earlier protocol revisions: no kind, task id under `id`
export const LegacyStatusEventSchema = z.object({
  id: z.string().min(1),
  final: z.boolean().default(false),
  status: TaskStatusSchema,
});

export const CreateTaskRequestSchema = z.object({
  message: z.string().optional(),
  agentId: z.string().optional(),
});

export type CreateTaskRequest = z.infer<typeof CreateTaskRequestSchema>;

// Serialized TaskRecord as held in the session store
export const StoredTaskRecordSchema = z.object({
  AgentId: z.string(),
  IsFinal: z.boolean(),
  Message: z.string().nullable().default(null),
});

export type StoredTaskRecord = z.infer<typeof StoredTaskRecordSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    )
    .join('; ');
}

function statusMessageText(
  message: z.infer<typeof TaskStatusSchema>['message'],
): string | undefined {
  if (message === undefined) {
    return undefined;
  }
  if (typeof message === 'string') {
    return message;
  }
  return collectPartsText(message.parts) ?? undefined;
}

function invalidPushEvent(error: z.ZodError): ValidationError {
  return new ValidationError(`Invalid push event: ${formatIssues(error)}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates an inbound push body and reduces it to a TaskStatusEvent.
 * The body's `kind` selects the shape; bodies without one use the legacy event.
 */
export function parsePushEvent(body: unknown): TaskStatusEvent {
  const kind = isRecord(body) ? body['kind'] : undefined;

  if (kind === 'status-update') {
    const result = TaskStatusUpdateEventSchema.safeParse(body);
    if (!result.success) {
      throw invalidPushEvent(result.error);
    }
    const event = result.data;
    return {
      taskId: event.taskId,
      state: event.status.state,
      final: event.final,
      statusMessage: statusMessageText(event.status.message),
    };
  }

  if (kind === 'task') {
    const result = TaskSnapshotSchema.safeParse(body);
    if (!result.success) {
      throw invalidPushEvent(result.error);
    }
    const task = result.data;
    return {
      taskId: task.id,
      state: task.status.state,
      final: TERMINAL_STATES.includes(task.status.state),
      statusMessage: statusMessageText(task.status.message),
    };
  }

  const result = LegacyStatusEventSchema.safeParse(body);
  if (!result.success) {
    throw invalidPushEvent(result.error);
  }
  const event = result.data;
  return {
    taskId: event.id,
    state: event.status.state,
    final: event.final,
    statusMessage: statusMessageText(event.status.message),
  };
}

export function parseCreateTaskRequest(body: unknown): CreateTaskRequest {
  const result = CreateTaskRequestSchema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError(`Invalid request: ${formatIssues(result.error)}`);
  }
  return result.data;
}
