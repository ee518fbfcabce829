import type { AgentCard, JSONRPCErrorResponse } from '@a2a-js/sdk';
import { A2AClient } from '@a2a-js/sdk/client';

import { Logger } from '../../utils/logger.js';
import { RemoteTaskError, errorMessage } from '../errors.js';
import { collectPartsText } from '../parts.js';

import type {
  RemoteTaskClient,
  RemoteTaskClientFactory,
  RemoteTaskSnapshot,
  SubmissionResult,
} from './types.js';

export interface RemoteAgentOptions {
  endpoint: string;
  apiVersion?: string;
  authToken?: string;
}

/**
 * URL of the A2A JSON-RPC endpoint serving one agent
 */
export function buildAgentUrl(options: RemoteAgentOptions, agentId: string): string {
  const base = options.endpoint.replace(/\/+$/, '');
  const url = new URL(`${base}/workflows/a2a/agents/${encodeURIComponent(agentId)}`);
  if (options.apiVersion) {
    url.searchParams.set('api-version', options.apiVersion);
  }
  return url.toString();
}

/**
 * The remote endpoint is addressed directly, so the card only carries the URL
 * and what the relay relies on.
 */
function buildAgentCard(agentId: string, url: string): AgentCard {
  return {
    name: agentId,
    description: `Remote agent ${agentId}`,
    url,
    version: '1.0.0',
    protocolVersion: '0.3.0',
    capabilities: { pushNotifications: true, streaming: false },
    defaultInputModes: ['text'],
    defaultOutputModes: ['text'],
    skills: [],
  };
}

function withBearerToken(token: string | undefined): typeof fetch {
  return (input, init) => {
    if (!token) {
      return fetch(input, init);
    }
    const headers = new Headers(init?.headers);
    headers.set('Authorization', `Bearer ${token}`);
    return fetch(input, { ...init, headers });
  };
}

function rpcFailure(operation: string, response: JSONRPCErrorResponse): RemoteTaskError {
  return new RemoteTaskError(
    `${operation} failed: ${response.error.message} (code ${response.error.code})`,
  );
}

/**
 * RemoteTaskClient over the A2A JSON-RPC transport
 */
export class A2ARemoteTaskClient implements RemoteTaskClient {
  private readonly client: A2AClient;
  private readonly logger = Logger.getInstance('RemoteTaskClient');

  constructor(
    private readonly agentId: string,
    options: RemoteAgentOptions,
  ) {
    const url = buildAgentUrl(options, agentId);
    this.client = new A2AClient(buildAgentCard(agentId, url), {
      fetchImpl: withBearerToken(options.authToken),
    });
  }

  async submit(message: string, messageId: string): Promise<SubmissionResult> {
    this.logger.debug('Sending message', { agentId: this.agentId, messageId });
    const response = await this.call('message/send', () =>
      this.client.sendMessage({
        message: {
          kind: 'message',
          messageId,
          role: 'user',
          parts: [{ kind: 'text', text: message }],
        },
      }),
    );
    if ('error' in response) {
      throw rpcFailure('message/send', response);
    }

    const result = response.result;
    if (result.kind === 'message') {
      return { kind: 'message', taskId: result.taskId, text: collectPartsText(result.parts) };
    }
    return {
      kind: 'task',
      taskId: result.id,
      state: result.status.state,
      artifacts: result.artifacts ?? [],
    };
  }

  async get(taskId: string): Promise<RemoteTaskSnapshot> {
    const response = await this.call('tasks/get', () => this.client.getTask({ id: taskId }));
    if ('error' in response) {
      throw rpcFailure('tasks/get', response);
    }
    const task = response.result;
    return { taskId: task.id, state: task.status.state, artifacts: task.artifacts ?? [] };
  }

  async cancel(taskId: string): Promise<void> {
    const response = await this.call('tasks/cancel', () => this.client.cancelTask({ id: taskId }));
    if ('error' in response) {
      throw rpcFailure('tasks/cancel', response);
    }
  }

  async registerPushCallback(taskId: string, url: string, token: string): Promise<void> {
    const response = await this.call('tasks/pushNotificationConfig/set', () =>
      this.client.setTaskPushNotificationConfig({
        taskId,
        pushNotificationConfig: { url, token },
      }),
    );
    if ('error' in response) {
      throw rpcFailure('tasks/pushNotificationConfig/set', response);
    }
  }

  /**
   * Runs one SDK call, turning transport failures into RemoteTaskError
   */
  private async call<T>(operation: string, send: () => Promise<T>): Promise<T> {
    try {
      return await send();
    } catch (error: unknown) {
      throw new RemoteTaskError(`${operation} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export function createA2AClientFactory(options: RemoteAgentOptions): RemoteTaskClientFactory {
  return (agentId: string) => new A2ARemoteTaskClient(agentId, options);
}
