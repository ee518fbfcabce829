import type { Artifact, Message, Task, TaskState, TextPart } from '@a2a-js/sdk';
import { http, HttpResponse } from 'msw';
import { z } from 'zod';

export const REMOTE_ENDPOINT = 'https://agents.test';

const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]),
  method: z.string(),
  params: z.unknown(),
});

const SendParamsSchema = z.object({
  message: z.object({
    messageId: z.string(),
    parts: z.array(z.object({ kind: z.string(), text: z.string().optional() })),
  }),
});

const TaskIdParamsSchema = z.object({ id: z.string() });

const PushConfigParamsSchema = z.object({
  taskId: z.string(),
  pushNotificationConfig: z.object({ url: z.string(), token: z.string().optional() }),
});

export interface RecordedRpcCall {
  agentId: string;
  method: string;
  params: unknown;
  authorization: string | null;
  url: string;
}

export interface SendRequest {
  agentId: string;
  text: string;
  messageId: string;
}

type SendBehaviour = (request: SendRequest) => Task | Message;

export function textArtifact(artifactId: string, ...texts: string[]): Artifact {
  return {
    artifactId,
    parts: texts.map((text): TextPart => ({ kind: 'text', text })),
  };
}

export function remoteTask(id: string, state: TaskState, artifacts?: Artifact[]): Task {
  return {
    kind: 'task',
    id,
    contextId: `ctx-${id}`,
    status: { state },
    ...(artifacts ? { artifacts } : {}),
  };
}

export function agentReply(text: string, taskId?: string): Message {
  return {
    kind: 'message',
    messageId: 'reply-1',
    role: 'agent',
    parts: [{ kind: 'text', text }],
    ...(taskId ? { taskId } : {}),
  };
}

/**
 * In-process remote agent. Tests program its answers and read back the
 * JSON-RPC calls it received.
 */
class RemoteAgentState {
  readonly calls: RecordedRpcCall[] = [];
  readonly tasks = new Map<string, Task>();
  private sendBehaviour: SendBehaviour | undefined;
  private rpcErrors = new Map<string, { code: number; message: string }>();
  private httpErrors = new Map<string, number>();
  private taskCounter = 0;

  reset(): void {
    this.calls.length = 0;
    this.tasks.clear();
    this.sendBehaviour = undefined;
    this.rpcErrors.clear();
    this.httpErrors.clear();
    this.taskCounter = 0;
  }

  /**
   * Replaces the default answer to message/send (a new task in `submitted`)
   */
  respondToSend(behaviour: SendBehaviour): void {
    this.sendBehaviour = behaviour;
  }

  putTask(task: Task): void {
    this.tasks.set(task.id, task);
  }

  failWithRpcError(method: string, code: number, message: string): void {
    this.rpcErrors.set(method, { code, message });
  }

  failWithHttpStatus(method: string, status: number): void {
    this.httpErrors.set(method, status);
  }

  callsTo(method: string): RecordedRpcCall[] {
    return this.calls.filter((call) => call.method === method);
  }

  handle(method: string, agentId: string, params: unknown): unknown {
    switch (method) {
      case 'message/send': {
        const { message } = SendParamsSchema.parse(params);
        const text = message.parts.map((part) => part.text ?? '').join('');
        const request = { agentId, text, messageId: message.messageId };
        const answer = this.sendBehaviour ? this.sendBehaviour(request) : this.newTask();
        if (answer.kind === 'task') {
          this.putTask(answer);
        }
        return answer;
      }
      case 'tasks/get': {
        const { id } = TaskIdParamsSchema.parse(params);
        return this.tasks.get(id);
      }
      case 'tasks/cancel': {
        const { id } = TaskIdParamsSchema.parse(params);
        const task = this.tasks.get(id);
        if (!task) {
          return undefined;
        }
        const canceled: Task = { ...task, status: { state: 'canceled' } };
        this.putTask(canceled);
        return canceled;
      }
      case 'tasks/pushNotificationConfig/set':
        return PushConfigParamsSchema.parse(params);
      default:
        return undefined;
    }
  }

  rpcErrorFor(method: string): { code: number; message: string } | undefined {
    return this.rpcErrors.get(method);
  }

  httpErrorFor(method: string): number | undefined {
    return this.httpErrors.get(method);
  }

  private newTask(): Task {
    this.taskCounter += 1;
    return remoteTask(`remote-task-${this.taskCounter}`, 'submitted');
  }
}

export const remoteAgent = new RemoteAgentState();

export const remoteAgentHandlers = [
  http.post<{ agentId: string }>(
    `${REMOTE_ENDPOINT}/workflows/a2a/agents/:agentId`,
    async ({ request, params }) => {
      const rpc = JsonRpcRequestSchema.parse(await request.json());
      remoteAgent.calls.push({
        agentId: params.agentId,
        method: rpc.method,
        params: rpc.params,
        authorization: request.headers.get('authorization'),
        url: request.url,
      });

      const httpStatus = remoteAgent.httpErrorFor(rpc.method);
      if (httpStatus !== undefined) {
        return new HttpResponse('upstream unavailable', { status: httpStatus });
      }

      const rpcError = remoteAgent.rpcErrorFor(rpc.method);
      if (rpcError) {
        return HttpResponse.json({ jsonrpc: '2.0', id: rpc.id, error: rpcError });
      }

      const result = remoteAgent.handle(rpc.method, params.agentId, rpc.params);
      if (result === undefined) {
        return HttpResponse.json({
          jsonrpc: '2.0',
          id: rpc.id,
          error: { code: -32001, message: 'Task not found' },
        });
      }
      return HttpResponse.json({ jsonrpc: '2.0', id: rpc.id, result });
    },
  ),
];
