import { ChatMessageDto } from '../../session/dto/chat-message.dto';
import { UserProfile } from '../../profile/interfaces/profile.interface';

export const CHAIN_FACTORY = Symbol('CHAIN_FACTORY');

/**
 * Stateless with respect to conversation history: the caller passes the
 * history on every call.
 */
export interface ReplyGenerator {
  generate(userText: string, history: readonly ChatMessageDto[]): Promise<string>;
}

export interface ChainFactory {
  build(userId: string): Promise<ReplyGenerator>;
}

export interface UserContext {
  userId: string;
  profile: UserProfile | null;
  moodSummary: string;
}
