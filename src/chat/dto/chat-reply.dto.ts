import { ChatMessageDto } from '../../session/dto/chat-message.dto';
import { SessionInfoDto } from '../../session/dto/session-info.dto';

export interface ChatReplyMetadata {
  messageCount: number;
  turnNumber: number;
  isNewSession: boolean;
}

export interface ChatReplyDto {
  sessionId: string;
  userMessage: string;
  aiResponse: string;
  metadata: ChatReplyMetadata;
}

export interface ChatHistoryDto {
  sessionId: string;
  messages: ChatMessageDto[];
}

export interface EndSessionDto {
  sessionId: string;
  ended: boolean;
}

export interface SessionListDto {
  sessions: SessionInfoDto[];
}
