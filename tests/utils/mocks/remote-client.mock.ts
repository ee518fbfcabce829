import type {
  RemoteTaskClient,
  RemoteTaskClientFactory,
  RemoteTaskSnapshot,
  SubmissionResult,
} from '../../../src/relay/remote/types.js';

export interface PushRegistration {
  taskId: string;
  url: string;
  token: string;
}

/**
 * Stub RemoteTaskClient that records every call. Answers are programmed per
 * test; an Error placed in a slot is thrown instead of returned.
 */
export class StubRemoteTaskClient implements RemoteTaskClient {
  submitCalls: Array<{ message: string; messageId: string }> = [];
  getCalls: string[] = [];
  cancelCalls: string[] = [];
  registrations: PushRegistration[] = [];

  submitResult: SubmissionResult | Error = {
    kind: 'task',
    taskId: 'task-1',
    state: 'submitted',
    artifacts: [],
  };
  snapshots = new Map<string, RemoteTaskSnapshot | Error>();
  cancelError: Error | undefined;
  registerError: Error | undefined;

  async submit(message: string, messageId: string): Promise<SubmissionResult> {
    this.submitCalls.push({ message, messageId });
    await Promise.resolve();
    if (this.submitResult instanceof Error) {
      throw this.submitResult;
    }
    return this.submitResult;
  }

  async get(taskId: string): Promise<RemoteTaskSnapshot> {
    this.getCalls.push(taskId);
    await Promise.resolve();
    const snapshot = this.snapshots.get(taskId);
    if (snapshot instanceof Error) {
      throw snapshot;
    }
    return snapshot ?? { taskId, state: 'completed', artifacts: [] };
  }

  async cancel(taskId: string): Promise<void> {
    this.cancelCalls.push(taskId);
    await Promise.resolve();
    if (this.cancelError) {
      throw this.cancelError;
    }
  }

  async registerPushCallback(taskId: string, url: string, token: string): Promise<void> {
    this.registrations.push({ taskId, url, token });
    await Promise.resolve();
    if (this.registerError) {
      throw this.registerError;
    }
  }
}

/**
 * Factory handing out one shared stub, with the agent ids it was asked for
 */
export function createStubClientFactory(
  client: StubRemoteTaskClient = new StubRemoteTaskClient(),
): {
  client: StubRemoteTaskClient;
  factory: RemoteTaskClientFactory;
  requestedAgents: string[];
} {
  const requestedAgents: string[] = [];
  const factory: RemoteTaskClientFactory = (agentId) => {
    requestedAgents.push(agentId);
    return client;
  };
  return { client, factory, requestedAgents };
}
