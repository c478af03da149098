import { Module, Global } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ChainModule } from '../chain/chain.module';
import { HistoryLoaderService } from './history-loader.service';
import { SessionCacheService } from './session-cache.service';
import { SessionLifecycleService } from './session-lifecycle.service';
import { SessionMetricsService } from './session-metrics.service';

@Global()
@Module({
  imports: [ConfigModule, ChainModule],
  providers: [
    SessionCacheService,
    HistoryLoaderService,
    SessionLifecycleService,
    SessionMetricsService,
  ],
  exports: [
    SessionCacheService,
    HistoryLoaderService,
    SessionLifecycleService,
    SessionMetricsService,
  ],
})
export class SessionModule {}
