import { Injectable, Logger } from '@nestjs/common';
import { AIService } from '../ai/ai.service';
import { ConversationChain } from './conversation-chain';
import {
  ChainFactory,
  ReplyGenerator,
} from './interfaces/reply-generator.interface';
import { buildSystemPrompt } from './prompts/companion.prompts';
import { UserContextService } from './user-context.service';

@Injectable()
export class ChainFactoryService implements ChainFactory {
  private readonly logger = new Logger(ChainFactoryService.name);

  constructor(
    private readonly userContextService: UserContextService,
    private readonly aiService: AIService,
  ) {}

  async build(userId: string): Promise<ReplyGenerator> {
    const context = await this.userContextService.getContext(userId);
    this.logger.debug(
      `Built chain for user ${userId} (profile: ${context.profile ? 'yes' : 'no'}, mood summary: ${context.moodSummary ? 'yes' : 'no'})`,
    );
    return new ConversationChain(this.aiService, buildSystemPrompt(context));
  }
}
