import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  isTurnStoreDriver,
  RawTurnRecord,
  TurnRecord,
  TurnStore,
  TurnStoreDriver,
} from './interfaces/turn-store.interface';
import { InMemoryTurnStoreAdapter } from './adapters/in-memory-turn-store.adapter';
import { RedisTurnStoreAdapter } from './adapters/redis-turn-store.adapter';
import { FirestoreTurnStoreAdapter } from './adapters/firestore-turn-store.adapter';

/**
 * Selects the turn store adapter once at startup. A durable driver that cannot
 * be reached at startup falls back to in-memory storage; after that, adapter
 * errors propagate to the caller.
 */
@Injectable()
export class StorageService implements TurnStore, OnModuleInit {
  private readonly logger = new Logger(StorageService.name);
  private activeAdapter: TurnStore;
  private configuredDriver: TurnStoreDriver = 'memory';
  private usingFallback = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly inMemoryAdapter: InMemoryTurnStoreAdapter,
    private readonly redisAdapter: RedisTurnStoreAdapter,
    private readonly firestoreAdapter: FirestoreTurnStoreAdapter,
  ) {
    this.activeAdapter = this.inMemoryAdapter;
  }

  async onModuleInit(): Promise<void> {
    await this.initializeStorage();
  }

  async initializeStorage(): Promise<void> {
    const driver = this.configService.get<string>('TURN_STORE_DRIVER', 'memory');
    if (!isTurnStoreDriver(driver)) {
      this.logger.warn(`Unknown turn store driver '${driver}', using memory`);
    }
    this.configuredDriver = isTurnStoreDriver(driver) ? driver : 'memory';

    if (this.configuredDriver === 'firestore') {
      this.logger.log('Attempting to initialize Firestore...');
      if (await this.firestoreAdapter.connect()) {
        this.useAdapter(this.firestoreAdapter, false);
        return;
      }
      this.logger.warn('Firestore unavailable, falling back to in-memory');
    }

    if (this.configuredDriver === 'redis') {
      this.logger.log('Attempting to connect to Redis...');
      if (await this.redisAdapter.connect()) {
        this.useAdapter(this.redisAdapter, false);
        return;
      }
      this.logger.warn('Redis connection failed, falling back to in-memory');
    }

    this.useAdapter(this.inMemoryAdapter, this.configuredDriver !== 'memory');
  }

  appendTurn(userId: string, sessionId: string, turn: TurnRecord): Promise<void> {
    return this.activeAdapter.appendTurn(userId, sessionId, turn);
  }

  loadTurns(
    userId: string,
    sessionId: string,
    limit: number,
  ): Promise<RawTurnRecord[]> {
    return this.activeAdapter.loadTurns(userId, sessionId, limit);
  }

  createSessionMetadata(
    userId: string,
    sessionId: string,
    createdAt: Date,
  ): Promise<void> {
    return this.activeAdapter.createSessionMetadata(userId, sessionId, createdAt);
  }

  updateSessionActivity(
    userId: string,
    sessionId: string,
    lastActivity: Date,
  ): Promise<void> {
    return this.activeAdapter.updateSessionActivity(
      userId,
      sessionId,
      lastActivity,
    );
  }

  markSessionEnded(
    userId: string,
    sessionId: string,
    endedAt: Date,
  ): Promise<void> {
    return this.activeAdapter.markSessionEnded(userId, sessionId, endedAt);
  }

  isHealthy(): Promise<boolean> {
    return this.activeAdapter.isHealthy();
  }

  getType(): string {
    return this.activeAdapter.getType();
  }

  getConfiguredDriver(): TurnStoreDriver {
    return this.configuredDriver;
  }

  isUsingFallback(): boolean {
    return this.usingFallback;
  }

  async getRedisLatency(): Promise<number | null> {
    if (this.activeAdapter === this.redisAdapter) {
      return this.redisAdapter.getLatency();
    }
    return null;
  }

  private useAdapter(adapter: TurnStore, fallback: boolean): void {
    this.activeAdapter = adapter;
    this.usingFallback = fallback;
    this.logger.log(`Using ${adapter.getType()} turn store`);
  }
}
