import { Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  PersistenceConfig,
  PersistenceFailedEvent,
  PersistenceJob,
  PersistenceStats,
} from './interfaces/persistence-job.interface';
import {
  PERSISTENCE_DEFAULTS,
  PERSISTENCE_EVENTS,
} from './constants/persistence.constants';

/**
 * Write-behind queue for turn store mutations.
 *
 * Jobs run on a fixed number of workers pulling from a bounded queue. A job is
 * attempted once: a failure is logged, reported as an event and dropped, and a
 * job offered to a full queue is dropped the same way. Jobs for the same
 * session may complete in any order.
 */
@Injectable()
export class PersistenceWriterService implements OnModuleDestroy {
  private readonly logger = new Logger(PersistenceWriterService.name);
  private readonly queue: PersistenceJob[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly config: PersistenceConfig;
  private running = 0;
  private completed = 0;
  private failed = 0;
  private dropped = 0;

  constructor(
    @Optional() private readonly configService?: ConfigService,
    @Optional() private readonly eventEmitter?: EventEmitter2,
  ) {
    this.config = {
      concurrency:
        this.configService?.get<number>('PERSISTENCE_CONCURRENCY') ??
        PERSISTENCE_DEFAULTS.CONCURRENCY,
      maxQueueSize:
        this.configService?.get<number>('PERSISTENCE_MAX_QUEUE') ??
        PERSISTENCE_DEFAULTS.MAX_QUEUE_SIZE,
      shutdownTimeoutMs:
        this.configService?.get<number>('PERSISTENCE_SHUTDOWN_TIMEOUT_MS') ??
        PERSISTENCE_DEFAULTS.SHUTDOWN_TIMEOUT_MS,
    };
  }

  /**
   * Submit a job without waiting for it.
   * @returns false when the queue is full and the job was dropped
   */
  enqueue(job: PersistenceJob): boolean {
    if (this.queue.length >= this.config.maxQueueSize) {
      this.dropped++;
      this.logger.warn(
        `Persistence queue full (${this.config.maxQueueSize}), dropping ${job.kind} for session ${job.sessionId.slice(0, 8)}`,
      );
      return false;
    }

    this.queue.push(job);
    this.pump();
    return true;
  }

  /**
   * Resolves once the queue is empty and no job is running
   */
  flush(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }

  getStats(): PersistenceStats {
    return {
      queued: this.queue.length,
      running: this.running,
      completed: this.completed,
      failed: this.failed,
      dropped: this.dropped,
      concurrency: this.config.concurrency,
      maxQueueSize: this.config.maxQueueSize,
    };
  }

  getConfig(): PersistenceConfig {
    return { ...this.config };
  }

  async onModuleDestroy(): Promise<void> {
    if (this.isIdle()) {
      return;
    }

    this.logger.log(
      `Waiting up to ${this.config.shutdownTimeoutMs}ms for ${this.queue.length + this.running} pending persistence job(s)`,
    );

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, this.config.shutdownTimeoutMs);
    });

    await Promise.race([this.flush(), timeout]);
    clearTimeout(timer);
  }

  private pump(): void {
    while (this.running < this.config.concurrency) {
      const job = this.queue.shift();
      if (!job) {
        return;
      }
      this.running++;
      void this.execute(job);
    }
  }

  private async execute(job: PersistenceJob): Promise<void> {
    try {
      await job.run();
      this.completed++;
    } catch (error) {
      this.failed++;
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(
        `Persistence job ${job.kind} failed for session ${job.sessionId.slice(0, 8)}: ${message}`,
      );

      const event: PersistenceFailedEvent = {
        kind: job.kind,
        userId: job.userId,
        sessionId: job.sessionId,
        error: message,
      };
      this.eventEmitter?.emit(PERSISTENCE_EVENTS.JOB_FAILED, event);
    } finally {
      this.running--;
      this.pump();
      if (this.isIdle()) {
        this.notifyIdle();
      }
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters.splice(0, this.idleWaiters.length);
    for (const resolve of waiters) {
      resolve();
    }
  }
}
