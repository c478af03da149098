export const TURN_STORE = Symbol('TURN_STORE');

export type TurnStoreDriver = 'firestore' | 'redis' | 'memory';

export interface TurnRecord {
  turnNumber: number;
  userMessage: string;
  assistantMessage: string;
  timestamp: Date;
}

/**
 * A turn exactly as the backing store returned it. Shape is not trusted;
 * the history loader validates it.
 */
export type RawTurnRecord = unknown;

export interface TurnStore {
  /**
   * Append one user/assistant exchange to the session's turn log
   */
  appendTurn(userId: string, sessionId: string, turn: TurnRecord): Promise<void>;

  /**
   * Load the most recent turns of a session, oldest first
   */
  loadTurns(
    userId: string,
    sessionId: string,
    limit: number,
  ): Promise<RawTurnRecord[]>;

  createSessionMetadata(
    userId: string,
    sessionId: string,
    createdAt: Date,
  ): Promise<void>;

  updateSessionActivity(
    userId: string,
    sessionId: string,
    lastActivity: Date,
  ): Promise<void>;

  /**
   * Mark a session ended. Its turns are kept.
   */
  markSessionEnded(
    userId: string,
    sessionId: string,
    endedAt: Date,
  ): Promise<void>;

  isHealthy(): Promise<boolean>;

  getType(): string;
}

export function isTurnStoreDriver(value: unknown): value is TurnStoreDriver {
  return value === 'firestore' || value === 'redis' || value === 'memory';
}
