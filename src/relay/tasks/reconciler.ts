import { v4 as uuidv4 } from 'uuid';

import { Logger, type LogContext } from '../../utils/logger.js';
import {
  RemoteSubmissionError,
  RemoteTaskError,
  TaskFailedError,
  UnknownTaskError,
  ValidationError,
  errorMessage,
} from '../errors.js';
import { collectArtifactText } from '../parts.js';
import type {
  RemoteTaskClient,
  RemoteTaskClientFactory,
  SubmissionResult,
} from '../remote/types.js';
import {
  INPUT_REQUIRED_MESSAGE,
  TERMINAL_STATES,
  failureMessage,
  type ReconcileOutcome,
  type TaskStatusEvent,
} from '../types.js';

import type { TaskStore } from './store.js';

export interface CreateTaskParams {
  sessionId: string;
  agentId: string | undefined;
  message: string | undefined;
  /** Push endpoint registered for tasks that are still running; omitted means no registration */
  callbackUrl?: string;
}

/**
 * Task lifecycle state machine.
 *
 * A task is pending until a push event moves it to completed, failed or
 * input-required. Records are only ever written through the TaskStore, which
 * keeps `isFinal` from reverting.
 */
export class TaskLifecycleReconciler {
  private readonly logger = Logger.getInstance('Reconciler');

  constructor(
    private readonly taskStore: TaskStore,
    private readonly clientFactory: RemoteTaskClientFactory,
  ) {}

  /**
   * Submits the message to the agent and starts tracking the resulting task.
   * Resolves with the remote task id.
   */
  async createTask(params: CreateTaskParams): Promise<string> {
    const { sessionId, callbackUrl } = params;
    const agentId = params.agentId?.trim();
    const message = params.message;
    if (!agentId) {
      throw new ValidationError('The Agent Id is empty.');
    }
    if (!message || message.trim() === '') {
      throw new ValidationError('The Message is empty.');
    }

    const messageId = uuidv4();
    const client = this.clientFactory(agentId);
    let result: SubmissionResult;
    try {
      result = await client.submit(message, messageId);
    } catch (error: unknown) {
      this.logger.error('Task submission failed', error, { sessionId, agentId });
      throw new RemoteSubmissionError(errorMessage(error), { cause: error });
    }

    if (result.kind === 'message') {
      // Answered directly, nothing will be pushed for it
      const taskId = result.taskId ?? messageId;
      await this.taskStore.insert(sessionId, taskId, {
        agentId,
        isFinal: true,
        message: result.text,
      });
      this.logger.info('Agent answered without a task', { sessionId, taskId, agentId });
      return taskId;
    }

    const { taskId, state } = result;
    if (state === 'failed') {
      this.logger.warn('Remote task failed on submission', { sessionId, taskId, agentId });
      throw new TaskFailedError(taskId);
    }

    if (state === 'input-required') {
      const context: LogContext = { sessionId, taskId, agentId, event: state };
      await this.taskStore.insert(sessionId, taskId, {
        agentId,
        isFinal: true,
        message: INPUT_REQUIRED_MESSAGE,
      });
      this.logger.info('Task requires input on submission, cancelling', context);
      await this.attempt('Cancel', () => client.cancel(taskId), context);
      return taskId;
    }

    const isFinal = TERMINAL_STATES.includes(state);
    await this.taskStore.insert(sessionId, taskId, {
      agentId,
      isFinal,
      message: collectArtifactText(result.artifacts),
    });
    this.logger.info('Task created', { sessionId, taskId, agentId, state });

    if (!isFinal) {
      await this.registerCallback(client, { sessionId, taskId, agentId }, callbackUrl);
    }
    return taskId;
  }

  /**
   * Applies one push event to the tracked task
   */
  async reconcile(sessionId: string, event: TaskStatusEvent): Promise<ReconcileOutcome> {
    const { taskId } = event;
    const record = await this.taskStore.get(sessionId, taskId);
    if (!record) {
      throw new UnknownTaskError(taskId);
    }
    const context: LogContext = { sessionId, taskId, agentId: record.agentId, event: event.state };

    switch (event.state) {
      case 'completed': {
        // The event carries no result, fetch the task for its artifacts
        let artifactsText: string | null;
        try {
          const snapshot = await this.clientFactory(record.agentId).get(taskId);
          artifactsText = collectArtifactText(snapshot.artifacts);
        } catch (error: unknown) {
          this.logger.error('Could not fetch completed task', error, context);
          throw error instanceof RemoteTaskError
            ? error
            : new RemoteTaskError(errorMessage(error), { cause: error });
        }
        await this.updateOrThrow(sessionId, taskId, {
          isFinal: event.final,
          message: artifactsText,
        });
        this.logger.info('Task completed', context);
        return 'completed';
      }

      case 'failed': {
        await this.updateOrThrow(sessionId, taskId, {
          isFinal: event.final,
          message: failureMessage(event.statusMessage),
        });
        this.logger.info('Task failed', { ...context, statusMessage: event.statusMessage });
        return 'failed';
      }

      case 'input-required': {
        await this.taskStore.update(sessionId, taskId, {
          isFinal: true,
          message: INPUT_REQUIRED_MESSAGE,
        });
        this.logger.info('Task requires input, cancelling', context);
        const client = this.clientFactory(record.agentId);
        await this.attempt('Cancel', () => client.cancel(taskId), context);
        return 'input-required';
      }

      default:
        this.logger.debug('No transition for task state', context);
        return 'ignored';
    }
  }

  private async registerCallback(
    client: RemoteTaskClient,
    task: { sessionId: string; taskId: string; agentId: string },
    callbackUrl: string | undefined,
  ): Promise<void> {
    if (!callbackUrl) {
      this.logger.debug('No callback URL, skipping push registration', task);
      return;
    }
    // The session token comes back as the notification token on every push
    await this.attempt(
      'Push callback registration',
      () => client.registerPushCallback(task.taskId, callbackUrl, task.sessionId),
      { ...task, callbackUrl },
    );
  }

  private async updateOrThrow(
    sessionId: string,
    taskId: string,
    changes: { isFinal: boolean; message: string | null },
  ): Promise<void> {
    const updated = await this.taskStore.update(sessionId, taskId, changes);
    if (!updated) {
      // Consumed by a result fetch while the event was being handled
      throw new UnknownTaskError(taskId);
    }
  }

  /**
   * Runs a best-effort remote step; a failure is logged and dropped
   */
  private async attempt(
    step: string,
    action: () => Promise<void>,
    context: LogContext,
  ): Promise<boolean> {
    try {
      await action();
      return true;
    } catch (error: unknown) {
      this.logger.warn(`${step} failed, ignoring`, { ...context, error: errorMessage(error) });
      return false;
    }
  }
}
