import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { v4 as uuidv4 } from 'uuid';
import {
  CHAIN_FACTORY,
  ChainFactory,
  ReplyGenerator,
} from '../chain/interfaces/reply-generator.interface';
import { PersistenceWriterService } from '../persistence/persistence-writer.service';
import { PersistenceJobKind } from '../persistence/interfaces/persistence-job.interface';
import {
  TURN_STORE,
  TurnStore,
} from '../storage/interfaces/turn-store.interface';
import {
  SESSION_EVENTS,
  SessionCreatedEvent,
  SessionEndedEvent,
  SessionResumedEvent,
} from './constants/session.constants';
import { ChatMessageDto } from './dto/chat-message.dto';
import { SessionInfoDto } from './dto/session-info.dto';
import { SessionUnavailableError } from './errors/session-unavailable.error';
import { HistoryLoaderService } from './history-loader.service';
import { ResolvedSession, Session } from './interfaces/session.interface';
import { SessionCacheService } from './session-cache.service';

/**
 * Entry point for everything that touches a session: creation, resumption,
 * turn bookkeeping and termination.
 *
 * Session state machine: active -> active on every recorded turn, and
 * active -> ended on termination or capacity eviction. Ended is terminal.
 */
@Injectable()
export class SessionLifecycleService {
  private readonly logger = new Logger(SessionLifecycleService.name);

  constructor(
    private readonly cache: SessionCacheService,
    private readonly historyLoader: HistoryLoaderService,
    private readonly writer: PersistenceWriterService,
    @Inject(TURN_STORE) private readonly turnStore: TurnStore,
    @Inject(CHAIN_FACTORY) private readonly chainFactory: ChainFactory,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Find or create the session a message belongs to.
   * @throws SessionUnavailableError when the turn store or chain factory fails
   */
  async resolve(userId: string, sessionId?: string): Promise<ResolvedSession> {
    return sessionId
      ? this.resume(userId, sessionId)
      : this.create(userId);
  }

  /**
   * Record a completed exchange. Persistence happens in the background and
   * the cached session is updated immediately.
   */
  recordTurn(
    userId: string,
    sessionId: string,
    userText: string,
    assistantText: string,
    turnNumber: number,
  ): void {
    const now = new Date();

    this.submit('append-turn', userId, sessionId, () =>
      this.turnStore.appendTurn(userId, sessionId, {
        turnNumber,
        userMessage: userText,
        assistantMessage: assistantText,
        timestamp: now,
      }),
    );
    this.submit('update-activity', userId, sessionId, () =>
      this.turnStore.updateSessionActivity(userId, sessionId, now),
    );

    if (!this.cache.touch(userId, sessionId, now)) {
      this.logger.debug(
        `Turn recorded for uncached session ${sessionId.slice(0, 8)}`,
      );
    }
  }

  /**
   * End a cached session explicitly.
   * @returns false when the session is not in the cache
   */
  async terminate(userId: string, sessionId: string): Promise<boolean> {
    return this.cache.withUserLock(userId, async () => {
      const removed = this.cache.remove(userId, sessionId);
      if (!removed) {
        return false;
      }

      this.markEnded(userId, sessionId);
      this.logger.log(
        `Terminated session ${sessionId.slice(0, 8)} for user ${userId}`,
      );
      this.emitEnded(userId, sessionId, 'terminated');
      return true;
    });
  }

  /**
   * Read-only history lookup for a session, cached or not.
   * @throws SessionUnavailableError when the turn store fails
   */
  async getHistory(userId: string, sessionId: string): Promise<ChatMessageDto[]> {
    return this.loadHistory(userId, sessionId);
  }

  getSessionInfo(userId: string, sessionId: string): SessionInfoDto | null {
    const session = this.cache.get(userId, sessionId);
    return session ? new SessionInfoDto(session) : null;
  }

  listSessions(userId: string): SessionInfoDto[] {
    return this.cache
      .getUserSessions(userId)
      .map((session) => new SessionInfoDto(session));
  }

  private async create(userId: string): Promise<ResolvedSession> {
    return this.cache.withUserLock(userId, async () => {
      const chain = await this.buildChain(userId);
      const now = new Date();
      const session: Session = {
        id: uuidv4(),
        userId,
        createdAt: now,
        lastActivityAt: now,
        messageCount: 0,
        status: 'active',
        chain,
      };

      this.insert(userId, session);
      this.submit('create-session', userId, session.id, () =>
        this.turnStore.createSessionMetadata(userId, session.id, now),
      );

      this.logger.log(
        `Created session ${session.id.slice(0, 8)} for user ${userId}`,
      );
      const event: SessionCreatedEvent = { userId, sessionId: session.id };
      this.eventEmitter.emit(SESSION_EVENTS.SESSION_CREATED, event);

      return { sessionId: session.id, chain, history: [], isNew: true };
    });
  }

  private async resume(
    userId: string,
    sessionId: string,
  ): Promise<ResolvedSession> {
    const history = await this.loadHistory(userId, sessionId);

    // Cached resumes skip the user lock
    const cached = this.cache.get(userId, sessionId);
    if (cached) {
      return this.resumed(userId, sessionId, cached.chain, history, true);
    }

    return this.cache.withUserLock(userId, async () => {
      const restored = this.cache.get(userId, sessionId);
      if (restored) {
        return this.resumed(userId, sessionId, restored.chain, history, true);
      }

      const chain = await this.buildChain(userId);
      const now = new Date();
      this.insert(userId, {
        id: sessionId,
        userId,
        createdAt: now,
        lastActivityAt: now,
        messageCount: Math.floor(history.length / 2),
        status: 'active',
        chain,
      });
      this.logger.log(
        `Restored session ${sessionId.slice(0, 8)} for user ${userId} with ${history.length} messages`,
      );

      return this.resumed(userId, sessionId, chain, history, false);
    });
  }

  private resumed(
    userId: string,
    sessionId: string,
    chain: ReplyGenerator,
    history: ChatMessageDto[],
    fromCache: boolean,
  ): ResolvedSession {
    const event: SessionResumedEvent = {
      userId,
      sessionId,
      fromCache,
      historyLength: history.length,
    };
    this.eventEmitter.emit(SESSION_EVENTS.SESSION_RESUMED, event);

    return { sessionId, chain, history, isNew: false };
  }

  private insert(userId: string, session: Session): void {
    const evicted = this.cache.put(userId, session);
    if (!evicted) {
      return;
    }

    this.markEnded(userId, evicted.id);
    this.eventEmitter.emit(SESSION_EVENTS.SESSION_EVICTED, {
      userId,
      sessionId: evicted.id,
    });
    this.emitEnded(userId, evicted.id, 'evicted');
  }

  private markEnded(userId: string, sessionId: string): void {
    const endedAt = new Date();
    this.submit('end-session', userId, sessionId, () =>
      this.turnStore.markSessionEnded(userId, sessionId, endedAt),
    );
  }

  private emitEnded(
    userId: string,
    sessionId: string,
    reason: SessionEndedEvent['reason'],
  ): void {
    const event: SessionEndedEvent = { userId, sessionId, reason };
    this.eventEmitter.emit(SESSION_EVENTS.SESSION_ENDED, event);
  }

  private submit(
    kind: PersistenceJobKind,
    userId: string,
    sessionId: string,
    run: () => Promise<void>,
  ): void {
    this.writer.enqueue({ kind, userId, sessionId, run });
  }

  private async loadHistory(
    userId: string,
    sessionId: string,
  ): Promise<ChatMessageDto[]> {
    try {
      return await this.historyLoader.load(userId, sessionId);
    } catch (error) {
      this.logger.error(
        `Failed to load history for session ${sessionId.slice(0, 8)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new SessionUnavailableError('Failed to load conversation history', {
        cause: error,
      });
    }
  }

  private async buildChain(userId: string): Promise<ReplyGenerator> {
    try {
      return await this.chainFactory.build(userId);
    } catch (error) {
      this.logger.error(
        `Failed to build reply generator for user ${userId}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new SessionUnavailableError('Failed to initialize chat session', {
        cause: error,
      });
    }
  }
}
