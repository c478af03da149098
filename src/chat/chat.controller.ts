import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Param,
  ParseUUIDPipe,
  Post,
  UseGuards,
} from '@nestjs/common';
import { ApiKeyGuard } from '../common/guards/api-key.guard';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { ChatService } from './chat.service';
import { SendMessageDto } from './dto/send-message.dto';
import {
  ChatHistoryDto,
  ChatReplyDto,
  EndSessionDto,
  SessionListDto,
} from './dto/chat-reply.dto';

@Controller('api/chat')
@UseGuards(ApiKeyGuard)
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  @Post('message')
  @HttpCode(HttpStatus.CREATED)
  sendMessage(
    @CurrentUser() userId: string,
    @Body() body: SendMessageDto,
  ): Promise<ChatReplyDto> {
    return this.chatService.sendMessage(userId, body.message, body.sessionId);
  }

  @Get('sessions')
  listSessions(@CurrentUser() userId: string): SessionListDto {
    return this.chatService.listSessions(userId);
  }

  @Get('sessions/:sessionId/history')
  getHistory(
    @CurrentUser() userId: string,
    @Param('sessionId', new ParseUUIDPipe({ version: '4' })) sessionId: string,
  ): Promise<ChatHistoryDto> {
    return this.chatService.getHistory(userId, sessionId);
  }

  @Delete('sessions/:sessionId')
  async endSession(
    @CurrentUser() userId: string,
    @Param('sessionId', new ParseUUIDPipe({ version: '4' })) sessionId: string,
  ): Promise<EndSessionDto> {
    const result = await this.chatService.endSession(userId, sessionId);
    if (!result.ended) {
      throw new NotFoundException('Session is not active');
    }
    return result;
  }
}
