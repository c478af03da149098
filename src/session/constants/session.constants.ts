export const SESSION_DEFAULTS = {
  MAX_SESSIONS_PER_USER: 2,
  MAX_HISTORY_MESSAGES: 25,
  MAX_MESSAGE_LENGTH: 1000,
} as const;

export const SESSION_EVENTS = {
  SESSION_CREATED: 'session.created',
  SESSION_RESUMED: 'session.resumed',
  SESSION_EVICTED: 'session.evicted',
  SESSION_ENDED: 'session.ended',
} as const;

export interface SessionCreatedEvent {
  userId: string;
  sessionId: string;
}

export interface SessionResumedEvent {
  userId: string;
  sessionId: string;
  fromCache: boolean;
  historyLength: number;
}

export interface SessionEndedEvent {
  userId: string;
  sessionId: string;
  reason: 'evicted' | 'terminated';
}
