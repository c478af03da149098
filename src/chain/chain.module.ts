import { Module } from '@nestjs/common';
import { ProfileModule } from '../profile/profile.module';
import { CHAIN_FACTORY } from './interfaces/reply-generator.interface';
import { ChainFactoryService } from './chain-factory.service';
import { UserContextService } from './user-context.service';

@Module({
  imports: [ProfileModule],
  providers: [
    UserContextService,
    ChainFactoryService,
    { provide: CHAIN_FACTORY, useExisting: ChainFactoryService },
  ],
  exports: [CHAIN_FACTORY, UserContextService],
})
export class ChainModule {}
