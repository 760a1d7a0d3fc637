/** Status codes as stored in TMTask.status and TMChecklistItem.status */
export const TaskStatus = {
  incomplete: 0,
  canceled: 2,
  completed: 3,
} as const;

export type TaskStatus = keyof typeof TaskStatus;

export const TASK_STATUSES: readonly TaskStatus[] = ['incomplete', 'canceled', 'completed'];
