import type { TaskState } from '@a2a-js/sdk';

/**
 * Locally held view of one remote task, stored per session under its taskId.
 */
export interface TaskRecord {
  agentId: string;
  isFinal: boolean;
  message: string | null;
}

/**
 * Push event after validation, independent of the wire shape it arrived in
 */
export interface TaskStatusEvent {
  taskId: string;
  state: TaskState;
  final: boolean;
  statusMessage?: string;
}

/**
 * Which transition reconcile applied
 */
export type ReconcileOutcome = 'completed' | 'failed' | 'input-required' | 'ignored';

export const TERMINAL_STATES: readonly TaskState[] = [
  'completed',
  'failed',
  'canceled',
  'rejected',
];

export const INPUT_REQUIRED_MESSAGE =
  'Error! The task is in "Input required" state, it is not supported yet.';

export function failureMessage(statusMessage: string | undefined): string {
  return `Error! Message: ${statusMessage ?? ''}`;
}
