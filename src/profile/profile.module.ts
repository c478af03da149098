import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FirebaseService } from '../firebase/firebase.service';
import { PROFILE_REPOSITORY } from './interfaces/profile.interface';
import { FirestoreProfileRepository } from './repositories/firestore-profile.repository';
import { InMemoryProfileRepository } from './repositories/in-memory-profile.repository';

@Module({
  providers: [
    InMemoryProfileRepository,
    {
      provide: PROFILE_REPOSITORY,
      inject: [ConfigService, FirebaseService, InMemoryProfileRepository],
      useFactory: (
        configService: ConfigService,
        firebaseService: FirebaseService,
        inMemory: InMemoryProfileRepository,
      ) => {
        const logger = new Logger('ProfileModule');
        if (configService.get<string>('TURN_STORE_DRIVER') !== 'firestore') {
          return inMemory;
        }
        if (firebaseService.initialize()) {
          logger.log('Reading profiles and mood logs from Firestore');
          return new FirestoreProfileRepository(firebaseService);
        }
        logger.warn('Firestore unavailable; using in-memory profiles');
        return inMemory;
      },
    },
  ],
  exports: [PROFILE_REPOSITORY, InMemoryProfileRepository],
})
export class ProfileModule {}
