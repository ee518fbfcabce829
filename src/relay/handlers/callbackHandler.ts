import { Logger } from '../../utils/logger.js';
import { UnknownTaskError, ValidationError } from '../errors.js';
import type { TaskLifecycleReconciler } from '../tasks/reconciler.js';
import type { ReconcileOutcome } from '../types.js';
import { parsePushEvent } from '../validation.js';

/**
 * Boundary of the push-notification endpoint: the ownership probe and event delivery
 */
export class CallbackEndpointHandler {
  private readonly logger = Logger.getInstance('CallbackHandler');

  constructor(private readonly reconciler: TaskLifecycleReconciler) {}

  /**
   * Echoes the validation token the push provider sends before delivering events
   */
  verify(validationToken: unknown): string {
    if (typeof validationToken !== 'string' || validationToken === '') {
      throw new ValidationError('Please provide the validation token.');
    }
    return validationToken;
  }

  /**
   * Validates a pushed event and hands it to the reconciler.
   * Without a session there is no owner to resolve, so the task is unknown.
   */
  async onEvent(sessionId: string | undefined, body: unknown): Promise<ReconcileOutcome> {
    const event = parsePushEvent(body);
    this.logger.debug('Push event received', {
      sessionId,
      taskId: event.taskId,
      event: event.state,
      final: event.final,
    });
    if (!sessionId) {
      throw new UnknownTaskError(event.taskId);
    }
    return this.reconciler.reconcile(sessionId, event);
  }
}
