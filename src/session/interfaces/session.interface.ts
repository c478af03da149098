import { ReplyGenerator } from '../../chain/interfaces/reply-generator.interface';
import { ChatMessageDto } from '../dto/chat-message.dto';

export type SessionStatus = 'active' | 'ended';

/**
 * A cached conversation. The cache owns the record and the reply generator
 * it references; the turns themselves live in the turn store.
 */
export interface Session {
  id: string;
  userId: string;
  createdAt: Date;
  lastActivityAt: Date;
  messageCount: number;
  status: SessionStatus;
  chain: ReplyGenerator;
}

export interface ResolvedSession {
  sessionId: string;
  chain: ReplyGenerator;
  history: ChatMessageDto[];
  isNew: boolean;
}

export interface SessionCacheStats {
  sessions: number;
  users: number;
  evictions: number;
  maxSessionsPerUser: number;
  /** Users with a create or restore in flight */
  lockedUsers: number;
}
