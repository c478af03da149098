import { ConfigService } from '@nestjs/config';
import { SessionConfig } from './interfaces/session-config.interface';
import { SESSION_DEFAULTS } from './constants/session.constants';

export function loadSessionConfig(configService?: ConfigService): SessionConfig {
  return {
    maxSessionsPerUser:
      configService?.get<number>('SESSION_MAX_PER_USER') ??
      SESSION_DEFAULTS.MAX_SESSIONS_PER_USER,
    maxHistoryMessages:
      configService?.get<number>('SESSION_MAX_HISTORY') ??
      SESSION_DEFAULTS.MAX_HISTORY_MESSAGES,
    maxMessageLength:
      configService?.get<number>('CHAT_MAX_MESSAGE_LENGTH') ??
      SESSION_DEFAULTS.MAX_MESSAGE_LENGTH,
  };
}
