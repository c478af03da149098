export const PERSISTENCE_DEFAULTS = {
  CONCURRENCY: 4,
  MAX_QUEUE_SIZE: 1000,
  SHUTDOWN_TIMEOUT_MS: 5000,
} as const;

export const PERSISTENCE_EVENTS = {
  JOB_FAILED: 'persistence.failed',
} as const;
