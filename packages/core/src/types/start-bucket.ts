/** Triage bucket codes as stored in TMTask.start */
export const StartBucket = {
  Inbox: 0,
  Anytime: 1,
  Someday: 2,
} as const;

export type StartBucket = keyof typeof StartBucket;

export const START_BUCKETS: readonly StartBucket[] = ['Inbox', 'Anytime', 'Someday'];
