import { AIService } from '../ai/ai.service';
import { AIMessage } from '../ai/interfaces/ai-provider.interface';
import { AI_ERRORS } from '../ai/constants/ai.constants';
import { ChatMessageDto, MessageRole } from '../session/dto/chat-message.dto';
import { ReplyGenerator } from './interfaces/reply-generator.interface';

/**
 * Reply generator bound to one user's system prompt.
 */
export class ConversationChain implements ReplyGenerator {
  constructor(
    private readonly aiService: AIService,
    private readonly systemPrompt: string,
  ) {}

  async generate(
    userText: string,
    history: readonly ChatMessageDto[],
  ): Promise<string> {
    const messages: AIMessage[] = [
      { role: 'system', content: this.systemPrompt },
      ...history.map(
        (message): AIMessage => ({
          role: message.role === MessageRole.USER ? 'user' : 'assistant',
          content: message.content,
        }),
      ),
      { role: 'user', content: userText },
    ];

    const result = await this.aiService.generateCompletion(messages);
    const reply = result.content.trim();
    if (!reply) {
      throw new Error(AI_ERRORS.EMPTY_COMPLETION);
    }
    return reply;
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }
}
