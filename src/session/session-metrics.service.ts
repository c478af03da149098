import { Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { PERSISTENCE_EVENTS } from '../persistence/constants/persistence.constants';
import { PersistenceFailedEvent } from '../persistence/interfaces/persistence-job.interface';
import {
  SESSION_EVENTS,
  SessionEndedEvent,
  SessionResumedEvent,
} from './constants/session.constants';

export interface SessionMetrics {
  created: number;
  resumedFromCache: number;
  restoredFromStore: number;
  evicted: number;
  terminated: number;
  persistenceFailures: number;
}

@Injectable()
export class SessionMetricsService {
  private metrics: SessionMetrics = SessionMetricsService.empty();

  @OnEvent(SESSION_EVENTS.SESSION_CREATED)
  handleCreated(): void {
    this.metrics.created++;
  }

  @OnEvent(SESSION_EVENTS.SESSION_RESUMED)
  handleResumed(event: SessionResumedEvent): void {
    if (event.fromCache) {
      this.metrics.resumedFromCache++;
    } else {
      this.metrics.restoredFromStore++;
    }
  }

  @OnEvent(SESSION_EVENTS.SESSION_ENDED)
  handleEnded(event: SessionEndedEvent): void {
    if (event.reason === 'evicted') {
      this.metrics.evicted++;
    } else {
      this.metrics.terminated++;
    }
  }

  @OnEvent(PERSISTENCE_EVENTS.JOB_FAILED)
  handlePersistenceFailed(_event: PersistenceFailedEvent): void {
    this.metrics.persistenceFailures++;
  }

  getMetrics(): SessionMetrics {
    return { ...this.metrics };
  }

  reset(): void {
    this.metrics = SessionMetricsService.empty();
  }

  private static empty(): SessionMetrics {
    return {
      created: 0,
      resumedFromCache: 0,
      restoredFromStore: 0,
      evicted: 0,
      terminated: 0,
      persistenceFailures: 0,
    };
  }
}
