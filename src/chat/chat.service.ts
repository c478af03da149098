import {
  BadRequestException,
  Injectable,
  Logger,
  Optional,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SessionLifecycleService } from '../session/session-lifecycle.service';
import { loadSessionConfig } from '../session/session.config';
import {
  ChatHistoryDto,
  ChatReplyDto,
  EndSessionDto,
  SessionListDto,
} from './dto/chat-reply.dto';

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);
  private readonly maxMessageLength: number;

  constructor(
    private readonly lifecycle: SessionLifecycleService,
    @Optional() configService?: ConfigService,
  ) {
    this.maxMessageLength = loadSessionConfig(configService).maxMessageLength;
  }

  /**
   * Run one exchange: resolve the session, generate the reply, then record
   * the turn without waiting for persistence.
   */
  async sendMessage(
    userId: string,
    rawMessage: string,
    sessionId?: string,
  ): Promise<ChatReplyDto> {
    const message = rawMessage.trim();
    if (!message) {
      throw new BadRequestException('Message cannot be empty');
    }
    // Limit is in code points
    if ([...message].length > this.maxMessageLength) {
      throw new BadRequestException(
        `Message too long (max ${this.maxMessageLength} characters)`,
      );
    }

    const session = await this.lifecycle.resolve(userId, sessionId);
    const turnNumber = Math.floor(session.history.length / 2);

    let aiResponse: string;
    try {
      aiResponse = await session.chain.generate(message, session.history);
    } catch (error) {
      this.logger.error(
        `Reply generation failed for session ${session.sessionId.slice(0, 8)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new ServiceUnavailableException(
        'The companion is unavailable right now, please try again',
      );
    }

    this.lifecycle.recordTurn(
      userId,
      session.sessionId,
      message,
      aiResponse,
      turnNumber,
    );

    const info = this.lifecycle.getSessionInfo(userId, session.sessionId);
    return {
      sessionId: session.sessionId,
      userMessage: message,
      aiResponse,
      metadata: {
        messageCount: info?.messageCount ?? turnNumber + 1,
        turnNumber,
        isNewSession: session.isNew,
      },
    };
  }

  async getHistory(userId: string, sessionId: string): Promise<ChatHistoryDto> {
    const messages = await this.lifecycle.getHistory(userId, sessionId);
    return { sessionId, messages };
  }

  listSessions(userId: string): SessionListDto {
    return { sessions: this.lifecycle.listSessions(userId) };
  }

  async endSession(userId: string, sessionId: string): Promise<EndSessionDto> {
    const ended = await this.lifecycle.terminate(userId, sessionId);
    return { sessionId, ended };
  }
}
