import { TurnRecord } from '../interfaces/turn-store.interface';

export type StoredTurnMessage = {
  role: 'user' | 'assistant';
  content: string;
};

/**
 * Turn layout written by every adapter: the two halves of the exchange carry
 * their own role marker so a reader can validate each one independently.
 */
export type StoredTurn = {
  turnNumber: number;
  timestamp: Date;
  messages: StoredTurnMessage[];
};

export function toStoredTurn(turn: TurnRecord): StoredTurn {
  return {
    turnNumber: turn.turnNumber,
    timestamp: turn.timestamp,
    messages: [
      { role: 'user', content: turn.userMessage },
      { role: 'assistant', content: turn.assistantMessage },
    ],
  };
}

export interface SessionMetadata {
  sessionId: string;
  userId: string;
  status: 'active' | 'ended';
  createdAt?: Date;
  lastActivity?: Date;
  endedAt?: Date;
}
