import { SessionCacheStats } from '../../session/interfaces/session.interface';
import { SessionMetrics } from '../../session/session-metrics.service';
import { PersistenceStats } from '../../persistence/interfaces/persistence-job.interface';
import { LRUCacheMetrics } from '../../cache/lru-cache';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface MemoryCheck {
  status: HealthStatus;
  heapUsed: number;
  heapTotal: number;
  rss: number;
  percentage: number;
}

export interface TurnStoreCheck {
  status: HealthStatus;
  driver: string;
  configuredDriver: string;
  usingFallback: boolean;
  latencyMs?: number;
  message?: string;
}

export interface SessionsCheck extends SessionCacheStats {
  metrics: SessionMetrics;
}

export interface PersistenceCheck extends PersistenceStats {
  status: HealthStatus;
}

export interface HealthCheckDto {
  status: HealthStatus;
  timestamp: string;
  version: string;
  environment: string;
  uptime: number;
  aiProvider: string;
  checks: {
    memory: MemoryCheck;
    turnStore: TurnStoreCheck;
    sessions: SessionsCheck;
    persistence: PersistenceCheck;
    moodSummaries: LRUCacheMetrics;
  };
}
