import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import {
  RawTurnRecord,
  TurnRecord,
  TurnStore,
} from '../interfaces/turn-store.interface';
import { toStoredTurn } from '../utils/stored-turn';

/**
 * Redis layout per session:
 *   {prefix}chat:{userId}:{sessionId}:turns  list of JSON turns, append order
 *   {prefix}chat:{userId}:{sessionId}:meta   hash of session metadata
 */
@Injectable()
export class RedisTurnStoreAdapter implements TurnStore, OnModuleDestroy {
  private readonly logger = new Logger(RedisTurnStoreAdapter.name);
  private client: Redis | null = null;
  private readonly keyPrefix: string;
  private isConnected = false;

  constructor(private readonly configService: ConfigService) {
    this.keyPrefix = this.configService.get<string>(
      'REDIS_KEY_PREFIX',
      'companion:',
    );
  }

  async connect(): Promise<boolean> {
    if (this.isConnected && this.client) {
      return true;
    }

    try {
      const host = this.configService.get<string>('REDIS_HOST', 'localhost');
      const port = this.configService.get<number>('REDIS_PORT', 6379);
      const password = this.configService.get<string>('REDIS_PASSWORD', '');
      const db = this.configService.get<number>('REDIS_DB', 0);

      this.client = new Redis({
        host,
        port,
        password: password || undefined,
        db,
        lazyConnect: true,
        connectTimeout: 5000,
        maxRetriesPerRequest: 3,
        retryStrategy: (times) => {
          if (times > 3) {
            return null;
          }
          return Math.min(times * 200, 1000);
        },
      });

      this.client.on('error', (err: Error) => {
        this.logger.error(`Redis connection error: ${err.message}`);
        this.isConnected = false;
      });

      this.client.on('connect', () => {
        this.logger.log('Redis connected');
        this.isConnected = true;
      });

      this.client.on('close', () => {
        this.logger.warn('Redis connection closed');
        this.isConnected = false;
      });

      await this.client.connect();
      this.isConnected = true;
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to connect to Redis: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      this.isConnected = false;
      return false;
    }
  }

  async appendTurn(
    userId: string,
    sessionId: string,
    turn: TurnRecord,
  ): Promise<void> {
    const client = this.getClient();
    const stored = toStoredTurn(turn);
    await client.rpush(
      this.getTurnsKey(userId, sessionId),
      JSON.stringify({ ...stored, timestamp: stored.timestamp.toISOString() }),
    );
  }

  async loadTurns(
    userId: string,
    sessionId: string,
    limit: number,
  ): Promise<RawTurnRecord[]> {
    if (limit <= 0) {
      return [];
    }

    const client = this.getClient();
    const entries = await client.lrange(
      this.getTurnsKey(userId, sessionId),
      -limit,
      -1,
    );

    const turns: RawTurnRecord[] = [];
    for (const entry of entries) {
      try {
        turns.push(JSON.parse(entry));
      } catch {
        this.logger.debug(
          `Skipping unreadable turn entry in session ${sessionId.slice(0, 8)}`,
        );
      }
    }
    return turns;
  }

  async createSessionMetadata(
    userId: string,
    sessionId: string,
    createdAt: Date,
  ): Promise<void> {
    const client = this.getClient();
    await client.hset(this.getMetaKey(userId, sessionId), {
      sessionId,
      userId,
      status: 'active',
      createdAt: createdAt.toISOString(),
      lastActivity: createdAt.toISOString(),
    });
  }

  async updateSessionActivity(
    userId: string,
    sessionId: string,
    lastActivity: Date,
  ): Promise<void> {
    const client = this.getClient();
    await client.hset(this.getMetaKey(userId, sessionId), {
      lastActivity: lastActivity.toISOString(),
    });
  }

  async markSessionEnded(
    userId: string,
    sessionId: string,
    endedAt: Date,
  ): Promise<void> {
    const client = this.getClient();
    await client.hset(this.getMetaKey(userId, sessionId), {
      status: 'ended',
      endedAt: endedAt.toISOString(),
    });
  }

  async isHealthy(): Promise<boolean> {
    if (!this.client || !this.isConnected) {
      return false;
    }

    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch {
      return false;
    }
  }

  getType(): string {
    return 'redis';
  }

  async getLatency(): Promise<number | null> {
    if (!this.client || !this.isConnected) {
      return null;
    }

    const start = Date.now();
    try {
      await this.client.ping();
      return Date.now() - start;
    } catch {
      return null;
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (this.client) {
      await this.client.quit();
      this.client = null;
      this.isConnected = false;
      this.logger.log('Redis connection closed');
    }
  }

  private getClient(): Redis {
    if (!this.client || !this.isConnected) {
      throw new Error('Redis not connected');
    }
    return this.client;
  }

  private getTurnsKey(userId: string, sessionId: string): string {
    return `${this.keyPrefix}chat:${userId}:${sessionId}:turns`;
  }

  private getMetaKey(userId: string, sessionId: string): string {
    return `${this.keyPrefix}chat:${userId}:${sessionId}:meta`;
  }
}
