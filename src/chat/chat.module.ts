import { Module } from '@nestjs/common';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';
import { ApiKeyGuard } from '../common/guards/api-key.guard';

@Module({
  controllers: [ChatController],
  providers: [ChatService, ApiKeyGuard],
  exports: [ChatService],
})
export class ChatModule {}
