/** Type codes as stored in TMTask.type */
export const TaskType = {
  'to-do': 0,
  project: 1,
  heading: 2,
} as const;

export type TaskType = keyof typeof TaskType;

export const TASK_TYPES: readonly TaskType[] = ['to-do', 'project', 'heading'];
