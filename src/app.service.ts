import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  HealthCheckDto,
  HealthStatus,
  MemoryCheck,
  PersistenceCheck,
  SessionsCheck,
  TurnStoreCheck,
} from './common/dto/health-check.dto';
import { StorageService } from './storage/storage.service';
import { SessionCacheService } from './session/session-cache.service';
import { SessionMetricsService } from './session/session-metrics.service';
import { PersistenceWriterService } from './persistence/persistence-writer.service';
import { AIService } from './ai/ai.service';
import { UserContextService } from './chain/user-context.service';

const MEMORY_WARNING_THRESHOLD = 0.8;
const MEMORY_CRITICAL_THRESHOLD = 0.95;
// Share of the persistence queue in use before reporting degraded
const QUEUE_WARNING_THRESHOLD = 0.8;

@Injectable()
export class AppService {
  private readonly startTime = Date.now();

  constructor(
    private readonly configService: ConfigService,
    private readonly storageService: StorageService,
    private readonly sessionCache: SessionCacheService,
    private readonly sessionMetrics: SessionMetricsService,
    private readonly persistenceWriter: PersistenceWriterService,
    private readonly aiService: AIService,
    private readonly userContext: UserContextService,
  ) {}

  getHealth(): { status: string; timestamp: string } {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }

  async getDetailedHealth(): Promise<HealthCheckDto> {
    const memory = this.checkMemory();
    const turnStore = await this.checkTurnStore();
    const persistence = this.checkPersistence();

    return {
      status: this.determineOverallStatus([
        memory.status,
        turnStore.status,
        persistence.status,
      ]),
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
      environment: this.configService.get<string>('NODE_ENV', 'development'),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      aiProvider: this.aiService.currentProvider,
      checks: {
        memory,
        turnStore,
        sessions: this.checkSessions(),
        persistence,
        moodSummaries: this.userContext.getCacheMetrics(),
      },
    };
  }

  private checkMemory(): MemoryCheck {
    const { heapUsed, heapTotal, rss } = process.memoryUsage();
    const percentage = heapTotal > 0 ? heapUsed / heapTotal : 0;

    let status: HealthStatus = 'healthy';
    if (percentage >= MEMORY_CRITICAL_THRESHOLD) {
      status = 'unhealthy';
    } else if (percentage >= MEMORY_WARNING_THRESHOLD) {
      status = 'degraded';
    }

    return {
      status,
      heapUsed,
      heapTotal,
      rss,
      percentage: Math.round(percentage * 100) / 100,
    };
  }

  private async checkTurnStore(): Promise<TurnStoreCheck> {
    const base = {
      driver: this.storageService.getType(),
      configuredDriver: this.storageService.getConfiguredDriver(),
      usingFallback: this.storageService.isUsingFallback(),
    };

    if (base.usingFallback) {
      return {
        ...base,
        status: 'degraded',
        message: `Using in-memory fallback (${base.configuredDriver} unavailable)`,
      };
    }

    try {
      const healthy = await this.storageService.isHealthy();
      const latencyMs = await this.storageService.getRedisLatency();
      return {
        ...base,
        status: healthy ? 'healthy' : 'unhealthy',
        latencyMs: latencyMs ?? undefined,
        message: healthy ? undefined : 'Turn store health check failed',
      };
    } catch (error) {
      return {
        ...base,
        status: 'unhealthy',
        message: `Turn store health check error: ${error instanceof Error ? error.message : 'Unknown error'}`,
      };
    }
  }

  private checkSessions(): SessionsCheck {
    return {
      ...this.sessionCache.getStats(),
      metrics: this.sessionMetrics.getMetrics(),
    };
  }

  private checkPersistence(): PersistenceCheck {
    const stats = this.persistenceWriter.getStats();
    const usage = stats.maxQueueSize > 0 ? stats.queued / stats.maxQueueSize : 0;
    return {
      ...stats,
      status: usage >= QUEUE_WARNING_THRESHOLD ? 'degraded' : 'healthy',
    };
  }

  private determineOverallStatus(statuses: HealthStatus[]): HealthStatus {
    if (statuses.includes('unhealthy')) {
      return 'unhealthy';
    }
    if (statuses.includes('degraded')) {
      return 'degraded';
    }
    return 'healthy';
  }
}
