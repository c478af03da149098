import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AppService } from './app.service';
import { StorageService } from './storage/storage.service';
import { SessionCacheService } from './session/session-cache.service';
import { SessionMetricsService } from './session/session-metrics.service';
import { PersistenceWriterService } from './persistence/persistence-writer.service';
import { AIService } from './ai/ai.service';
import { UserContextService } from './chain/user-context.service';

describe('AppService', () => {
  let service: AppService;
  let mockStorageService: jest.Mocked<StorageService>;
  let mockPersistenceWriter: jest.Mocked<PersistenceWriterService>;
  let metrics: SessionMetricsService;

  const persistenceStats = {
    queued: 0,
    running: 0,
    completed: 12,
    failed: 1,
    dropped: 0,
    concurrency: 4,
    maxQueueSize: 10,
  };

  const summaryMetrics = {
    hits: 3,
    misses: 2,
    evictions: 0,
    size: 2,
    maxSize: 1000,
  };

  beforeEach(async () => {
    mockStorageService = {
      getType: jest.fn().mockReturnValue('memory'),
      getConfiguredDriver: jest.fn().mockReturnValue('memory'),
      isUsingFallback: jest.fn().mockReturnValue(false),
      isHealthy: jest.fn().mockResolvedValue(true),
      getRedisLatency: jest.fn().mockResolvedValue(null),
    } as unknown as jest.Mocked<StorageService>;

    mockPersistenceWriter = {
      getStats: jest.fn().mockReturnValue(persistenceStats),
    } as unknown as jest.Mocked<PersistenceWriterService>;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AppService,
        SessionCacheService,
        SessionMetricsService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string, defaultValue?: unknown) =>
              key === 'NODE_ENV' ? 'test' : defaultValue,
            ),
          },
        },
        { provide: StorageService, useValue: mockStorageService },
        { provide: PersistenceWriterService, useValue: mockPersistenceWriter },
        { provide: AIService, useValue: { currentProvider: 'mock' } },
        {
          provide: UserContextService,
          useValue: { getCacheMetrics: jest.fn().mockReturnValue(summaryMetrics) },
        },
      ],
    }).compile();

    service = module.get<AppService>(AppService);
    metrics = module.get<SessionMetricsService>(SessionMetricsService);
  });

  describe('getHealth', () => {
    it('should return ok with an ISO timestamp', () => {
      const result = service.getHealth();

      expect(result.status).toBe('ok');
      expect(new Date(result.timestamp).toISOString()).toBe(result.timestamp);
    });
  });

  describe('getDetailedHealth', () => {
    it('should report turn store, sessions and persistence', async () => {
      metrics.handleCreated();

      const result = await service.getDetailedHealth();

      expect(result.environment).toBe('test');
      expect(result.aiProvider).toBe('mock');
      expect(result.checks.turnStore).toEqual({
        status: 'healthy',
        driver: 'memory',
        configuredDriver: 'memory',
        usingFallback: false,
        latencyMs: undefined,
        message: undefined,
      });
      expect(result.checks.sessions).toEqual({
        sessions: 0,
        users: 0,
        evictions: 0,
        maxSessionsPerUser: 2,
        lockedUsers: 0,
        metrics: {
          created: 1,
          resumedFromCache: 0,
          restoredFromStore: 0,
          evicted: 0,
          terminated: 0,
          persistenceFailures: 0,
        },
      });
      expect(result.checks.persistence).toEqual({
        ...persistenceStats,
        status: 'healthy',
      });
      expect(result.checks.moodSummaries).toEqual(summaryMetrics);
    });

    it('should be degraded when the turn store fell back to memory', async () => {
      mockStorageService.isUsingFallback.mockReturnValue(true);
      mockStorageService.getConfiguredDriver.mockReturnValue('firestore');

      const result = await service.getDetailedHealth();

      expect(result.checks.turnStore.status).toBe('degraded');
      expect(result.checks.turnStore.message).toBe(
        'Using in-memory fallback (firestore unavailable)',
      );
      expect(mockStorageService.isHealthy).not.toHaveBeenCalled();
    });

    it('should be unhealthy when the turn store check fails', async () => {
      mockStorageService.isHealthy.mockRejectedValue(new Error('timeout'));

      const result = await service.getDetailedHealth();

      expect(result.checks.turnStore).toMatchObject({
        status: 'unhealthy',
        message: 'Turn store health check error: timeout',
      });
      expect(result.status).toBe('unhealthy');
    });

    it('should be degraded when the persistence queue is nearly full', async () => {
      mockPersistenceWriter.getStats.mockReturnValue({
        ...persistenceStats,
        queued: 8,
      });

      const result = await service.getDetailedHealth();

      expect(result.checks.persistence.status).toBe('degraded');
    });
  });
});
