export type PersistenceJobKind =
  | 'create-session'
  | 'append-turn'
  | 'update-activity'
  | 'end-session';

export interface PersistenceJob {
  kind: PersistenceJobKind;
  userId: string;
  sessionId: string;
  run: () => Promise<void>;
}

export interface PersistenceConfig {
  concurrency: number;
  maxQueueSize: number;
  shutdownTimeoutMs: number;
}

export interface PersistenceStats {
  queued: number;
  running: number;
  completed: number;
  failed: number;
  dropped: number;
  concurrency: number;
  maxQueueSize: number;
}

export interface PersistenceFailedEvent {
  kind: PersistenceJobKind;
  userId: string;
  sessionId: string;
  error: string;
}
