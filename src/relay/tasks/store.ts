import { Logger } from '../../utils/logger.js';
import type { SessionStore } from '../sessions/types.js';
import type { TaskRecord } from '../types.js';
import { StoredTaskRecordSchema, type StoredTaskRecord } from '../validation.js';

export function serializeTaskRecord(record: TaskRecord): string {
  const stored: StoredTaskRecord = {
    AgentId: record.agentId,
    IsFinal: record.isFinal,
    Message: record.message,
  };
  return JSON.stringify(stored);
}

/**
 * Returns undefined for values that are not a stored TaskRecord
 */
export function deserializeTaskRecord(value: string): TaskRecord | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch {
    return undefined;
  }
  const parsed = StoredTaskRecordSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  return {
    agentId: parsed.data.AgentId,
    isFinal: parsed.data.IsFinal,
    message: parsed.data.Message,
  };
}

/**
 * Session-scoped mapping taskId -> TaskRecord on top of a SessionStore
 */
export class TaskStore {
  private readonly logger = Logger.getInstance('TaskStore');

  constructor(private readonly sessions: SessionStore) {}

  async insert(sessionId: string, taskId: string, record: TaskRecord): Promise<void> {
    await this.sessions.set(sessionId, taskId, serializeTaskRecord(record));
    this.logger.debug('Task record stored', { sessionId, taskId, isFinal: record.isFinal });
  }

  async get(sessionId: string, taskId: string): Promise<TaskRecord | undefined> {
    const value = await this.sessions.get(sessionId, taskId);
    if (value === undefined) {
      return undefined;
    }
    const record = deserializeTaskRecord(value);
    if (!record) {
      this.logger.warn('Ignoring unreadable task record', { sessionId, taskId });
    }
    return record;
  }

  /**
   * Overwrites message and final flag of an existing record. A record that is
   * already final stays final. Resolves undefined when there is no record.
   */
  async update(
    sessionId: string,
    taskId: string,
    changes: Pick<TaskRecord, 'isFinal' | 'message'>,
  ): Promise<TaskRecord | undefined> {
    const existing = await this.get(sessionId, taskId);
    if (!existing) {
      return undefined;
    }
    const updated: TaskRecord = {
      agentId: existing.agentId,
      isFinal: existing.isFinal || changes.isFinal,
      message: changes.message,
    };
    await this.sessions.set(sessionId, taskId, serializeTaskRecord(updated));
    this.logger.debug('Task record updated', { sessionId, taskId, isFinal: updated.isFinal });
    return updated;
  }

  /**
   * Reads and removes a record in one step
   */
  async take(sessionId: string, taskId: string): Promise<TaskRecord | undefined> {
    const record = await this.get(sessionId, taskId);
    if (!record) {
      return undefined;
    }
    await this.sessions.delete(sessionId, taskId);
    return record;
  }
}
