import { Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { Session, SessionCacheStats } from './interfaces/session.interface';
import { loadSessionConfig } from './session.config';
import { selectEvictionVictim } from './utils/eviction-policy';

/**
 * Bounded per-user cache of active sessions.
 *
 * Every method here is synchronous, so each one is atomic on the event loop.
 * Sequences that await between a read and a write (building a reply generator
 * before inserting it) go through withUserLock, which serialises them per user.
 */
@Injectable()
export class SessionCacheService implements OnModuleDestroy {
  private readonly logger = new Logger(SessionCacheService.name);
  private readonly sessions = new Map<string, Map<string, Session>>();
  private readonly userLocks = new KeyedMutex();
  private readonly maxSessionsPerUser: number;
  private evictions = 0;

  constructor(@Optional() private readonly configService?: ConfigService) {
    this.maxSessionsPerUser = loadSessionConfig(
      this.configService,
    ).maxSessionsPerUser;
  }

  onModuleDestroy(): void {
    this.clear();
  }

  get(userId: string, sessionId: string): Session | null {
    return this.sessions.get(userId)?.get(sessionId) ?? null;
  }

  /**
   * Insert or overwrite a session.
   * @returns the session evicted to make room, or null when none was needed
   */
  put(userId: string, session: Session): Session | null {
    let userSessions = this.sessions.get(userId);
    if (!userSessions) {
      userSessions = new Map<string, Session>();
      this.sessions.set(userId, userSessions);
    }

    let evicted: Session | null = null;
    if (
      !userSessions.has(session.id) &&
      userSessions.size >= this.maxSessionsPerUser
    ) {
      evicted = this.evict(userId, userSessions);
    }

    userSessions.set(session.id, session);
    return evicted;
  }

  remove(userId: string, sessionId: string): Session | null {
    const userSessions = this.sessions.get(userId);
    const session = userSessions?.get(sessionId);
    if (!userSessions || !session) {
      return null;
    }

    userSessions.delete(sessionId);
    if (userSessions.size === 0) {
      this.sessions.delete(userId);
    }

    session.status = 'ended';
    return session;
  }

  touch(userId: string, sessionId: string, now: Date = new Date()): boolean {
    const session = this.get(userId, sessionId);
    if (!session) {
      return false;
    }

    session.lastActivityAt = now;
    session.messageCount++;
    return true;
  }

  selectEvictionVictim(userId: string): string | null {
    const userSessions = this.sessions.get(userId);
    if (!userSessions) {
      return null;
    }
    return selectEvictionVictim(userSessions.values());
  }

  withUserLock<T>(userId: string, task: () => Promise<T>): Promise<T> {
    return this.userLocks.runExclusive(userId, task);
  }

  getUserSessions(userId: string): Session[] {
    return Array.from(this.sessions.get(userId)?.values() ?? []);
  }

  countUserSessions(userId: string): number {
    return this.sessions.get(userId)?.size ?? 0;
  }

  size(): number {
    let total = 0;
    for (const userSessions of this.sessions.values()) {
      total += userSessions.size;
    }
    return total;
  }

  getStats(): SessionCacheStats {
    return {
      sessions: this.size(),
      users: this.sessions.size,
      evictions: this.evictions,
      maxSessionsPerUser: this.maxSessionsPerUser,
      lockedUsers: this.userLocks.size,
    };
  }

  clear(): void {
    for (const userSessions of this.sessions.values()) {
      for (const session of userSessions.values()) {
        session.status = 'ended';
      }
    }
    this.sessions.clear();
  }

  private evict(
    userId: string,
    userSessions: Map<string, Session>,
  ): Session | null {
    const victimId = selectEvictionVictim(userSessions.values());
    const victim = victimId ? userSessions.get(victimId) : undefined;
    if (!victimId || !victim) {
      return null;
    }

    userSessions.delete(victimId);
    victim.status = 'ended';
    this.evictions++;

    this.logger.log(
      `Evicted session ${victimId.slice(0, 8)} for user ${userId} (capacity ${this.maxSessionsPerUser})`,
    );
    return victim;
  }
}
