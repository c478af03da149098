import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PersistenceWriterService } from './persistence-writer.service';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [PersistenceWriterService],
  exports: [PersistenceWriterService],
})
export class PersistenceModule {}
