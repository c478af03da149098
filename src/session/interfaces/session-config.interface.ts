export interface SessionConfig {
  maxSessionsPerUser: number;
  maxHistoryMessages: number;
  maxMessageLength: number;
}
