import { beforeEach, describe, expect, it } from 'vitest';

import { NotFoundError, ValidationError } from '../errors.js';
import { InMemorySessionStore } from '../sessions/memoryStore.js';
import { TaskStore } from '../tasks/store.js';

import { ResultAccessor } from './resultAccessor.js';

describe('ResultAccessor', () => {
  let taskStore: TaskStore;
  let accessor: ResultAccessor;

  beforeEach(() => {
    taskStore = new TaskStore(new InMemorySessionStore({ idleTimeoutMinutes: 20 }));
    accessor = new ResultAccessor(taskStore);
  });

  it('returns the record and removes it', async () => {
    // Given a finished task
    await taskStore.insert('session-1', 'task-1', {
      agentId: 'agent-a',
      isFinal: true,
      message: 'Summary',
    });

    // When fetching the result twice
    const record = await accessor.fetchAndClear('session-1', 'task-1');
    const second = accessor.fetchAndClear('session-1', 'task-1');

    // Then the first fetch returns it and the second finds nothing
    expect(record).toEqual({ agentId: 'agent-a', isFinal: true, message: 'Summary' });
    await expect(second).rejects.toThrow(new NotFoundError('task-1'));
  });

  it('also consumes pending records', async () => {
    // Given a task that has not finished
    await taskStore.insert('session-1', 'task-1', {
      agentId: 'agent-a',
      isFinal: false,
      message: null,
    });

    // When fetching it
    const record = await accessor.fetchAndClear('session-1', 'task-1');

    // Then the pending record is returned and gone afterwards
    expect(record.isFinal).toBe(false);
    await expect(taskStore.get('session-1', 'task-1')).resolves.toBeUndefined();
  });

  it('does not see records of other sessions', async () => {
    await taskStore.insert('session-1', 'task-1', {
      agentId: 'agent-a',
      isFinal: true,
      message: 'Summary',
    });

    await expect(accessor.fetchAndClear('session-2', 'task-1')).rejects.toThrow(NotFoundError);
    await expect(taskStore.get('session-1', 'task-1')).resolves.toBeDefined();
  });

  it.each([{ taskId: undefined }, { taskId: '' }, { taskId: ['task-1', 'task-2'] }])(
    'rejects task id $taskId',
    async ({ taskId }) => {
      await expect(accessor.fetchAndClear('session-1', taskId)).rejects.toThrow(
        new ValidationError('Please provide the task id.'),
      );
    },
  );
});
