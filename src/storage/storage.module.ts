import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { StorageService } from './storage.service';
import { InMemoryTurnStoreAdapter } from './adapters/in-memory-turn-store.adapter';
import { RedisTurnStoreAdapter } from './adapters/redis-turn-store.adapter';
import { FirestoreTurnStoreAdapter } from './adapters/firestore-turn-store.adapter';
import { TURN_STORE } from './interfaces/turn-store.interface';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    InMemoryTurnStoreAdapter,
    RedisTurnStoreAdapter,
    FirestoreTurnStoreAdapter,
    StorageService,
    { provide: TURN_STORE, useExisting: StorageService },
  ],
  exports: [StorageService, InMemoryTurnStoreAdapter, TURN_STORE],
})
export class StorageModule {}
