import type { Artifact, TaskState } from '@a2a-js/sdk';

/**
 * Synchronous answer to a submission: either a task the agent created, or a
 * direct message when the agent replied without creating one.
 */
export type SubmissionResult =
  | { kind: 'task'; taskId: string; state: TaskState; artifacts: Artifact[] }
  | { kind: 'message'; taskId?: string; text: string | null };

export interface RemoteTaskSnapshot {
  taskId: string;
  state: TaskState;
  artifacts: Artifact[];
}

/**
 * Client for one remote agent. Every call may reject with RemoteTaskError.
 */
export interface RemoteTaskClient {
  submit(message: string, messageId: string): Promise<SubmissionResult>;
  get(taskId: string): Promise<RemoteTaskSnapshot>;
  cancel(taskId: string): Promise<void>;
  registerPushCallback(taskId: string, url: string, token: string): Promise<void>;
}

/**
 * Creates a fresh client scoped to an agent; clients are not shared between requests.
 */
export type RemoteTaskClientFactory = (agentId: string) => RemoteTaskClient;
