import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import {
  RawTurnRecord,
  TurnRecord,
  TurnStore,
} from '../interfaces/turn-store.interface';
import {
  SessionMetadata,
  StoredTurn,
  toStoredTurn,
} from '../utils/stored-turn';

interface StoredSession {
  metadata: SessionMetadata;
  turns: StoredTurn[];
}

/**
 * Process-local turn store. Used when no durable driver is configured, as the
 * fallback when one cannot be reached, and by tests.
 */
@Injectable()
export class InMemoryTurnStoreAdapter implements TurnStore, OnModuleDestroy {
  private readonly logger = new Logger(InMemoryTurnStoreAdapter.name);
  private readonly store = new Map<string, StoredSession>();

  async appendTurn(
    userId: string,
    sessionId: string,
    turn: TurnRecord,
  ): Promise<void> {
    this.getOrCreate(userId, sessionId).turns.push(toStoredTurn(turn));
  }

  async loadTurns(
    userId: string,
    sessionId: string,
    limit: number,
  ): Promise<RawTurnRecord[]> {
    const stored = this.store.get(this.getKey(userId, sessionId));
    if (!stored || limit <= 0) {
      return [];
    }

    return stored.turns.slice(-limit).map((turn) => ({
      ...turn,
      messages: turn.messages.map((message) => ({ ...message })),
    }));
  }

  async createSessionMetadata(
    userId: string,
    sessionId: string,
    createdAt: Date,
  ): Promise<void> {
    const stored = this.getOrCreate(userId, sessionId);
    stored.metadata.createdAt = createdAt;
    stored.metadata.lastActivity ??= createdAt;
  }

  async updateSessionActivity(
    userId: string,
    sessionId: string,
    lastActivity: Date,
  ): Promise<void> {
    this.getOrCreate(userId, sessionId).metadata.lastActivity = lastActivity;
  }

  async markSessionEnded(
    userId: string,
    sessionId: string,
    endedAt: Date,
  ): Promise<void> {
    const { metadata } = this.getOrCreate(userId, sessionId);
    metadata.status = 'ended';
    metadata.endedAt = endedAt;
  }

  async getSessionMetadata(
    userId: string,
    sessionId: string,
  ): Promise<SessionMetadata | null> {
    const stored = this.store.get(this.getKey(userId, sessionId));
    return stored ? { ...stored.metadata } : null;
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  getType(): string {
    return 'memory';
  }

  async clear(): Promise<void> {
    this.store.clear();
    this.logger.debug('All sessions cleared from turn store');
  }

  onModuleDestroy(): void {
    this.store.clear();
  }

  private getKey(userId: string, sessionId: string): string {
    return `${userId}:${sessionId}`;
  }

  private getOrCreate(userId: string, sessionId: string): StoredSession {
    const key = this.getKey(userId, sessionId);
    let stored = this.store.get(key);
    if (!stored) {
      stored = {
        metadata: { sessionId, userId, status: 'active' },
        turns: [],
      };
      this.store.set(key, stored);
    }
    return stored;
  }
}
