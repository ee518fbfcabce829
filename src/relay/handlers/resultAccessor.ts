import { Logger } from '../../utils/logger.js';
import { NotFoundError, ValidationError } from '../errors.js';
import type { TaskStore } from '../tasks/store.js';
import type { TaskRecord } from '../types.js';

/**
 * Pull API for task results. Reading a result removes it.
 */
export class ResultAccessor {
  private readonly logger = Logger.getInstance('ResultAccessor');

  constructor(private readonly taskStore: TaskStore) {}

  async fetchAndClear(sessionId: string, taskId: unknown): Promise<TaskRecord> {
    if (typeof taskId !== 'string' || taskId === '') {
      throw new ValidationError('Please provide the task id.');
    }
    const record = await this.taskStore.take(sessionId, taskId);
    if (!record) {
      throw new NotFoundError(taskId);
    }
    this.logger.debug('Task result delivered', { sessionId, taskId, isFinal: record.isFinal });
    return record;
  }
}
