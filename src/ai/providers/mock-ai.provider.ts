import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AIProvider,
  AICompletionOptions,
  AICompletionResult,
  AIMessage,
} from '../interfaces/ai-provider.interface';
import { AI_DEFAULTS } from '../constants/ai.constants';

const MOOD_SUMMARY_MARKER = 'summarize the following mood logs';

@Injectable()
export class MockAIProvider implements AIProvider {
  readonly name = 'mock';
  readonly isAvailable = true;

  private readonly logger = new Logger(MockAIProvider.name);
  private readonly responseDelayMs: number;

  constructor(private readonly configService: ConfigService) {
    const delayValue = this.configService.get<string | number>(
      'AI_MOCK_RESPONSE_DELAY_MS',
    );
    this.responseDelayMs =
      delayValue !== undefined && delayValue !== ''
        ? Number(delayValue)
        : AI_DEFAULTS.MOCK_RESPONSE_DELAY_MS;
  }

  async generateCompletion(
    messages: AIMessage[],
    _options?: AICompletionOptions,
  ): Promise<AICompletionResult> {
    this.logger.debug(
      `Generating mock completion for ${messages.length} messages`,
    );

    // Simulate API delay
    await this.delay(this.responseDelayMs);

    const response = this.isMoodSummaryRequest(messages)
      ? 'The user has reported a mix of moods recently and could use some gentle encouragement.'
      : this.generateMockResponse(this.getLastUserMessage(messages), messages);

    const promptTokens = this.estimateTokens(messages);
    const completionTokens = this.estimateTokens([
      { role: 'assistant', content: response },
    ]);

    return {
      content: response,
      finishReason: 'stop',
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
    };
  }

  private isMoodSummaryRequest(messages: AIMessage[]): boolean {
    return messages.some(
      (m) =>
        m.role === 'system' &&
        m.content.toLowerCase().includes(MOOD_SUMMARY_MARKER),
    );
  }

  private getLastUserMessage(messages: AIMessage[]): string {
    for (let i = messages.length - 1; i >= 0; i--) {
      if (messages[i].role === 'user') {
        return messages[i].content;
      }
    }
    return '';
  }

  private generateMockResponse(
    userMessage: string,
    conversation: AIMessage[],
  ): string {
    const lowerMessage = userMessage.toLowerCase();

    if (this.matchesWord(lowerMessage, ['hello', 'hi', 'hey'])) {
      return "Hi! It's good to hear from you. How are you feeling today?";
    }

    if (this.matchesPattern(lowerMessage, ['stress', 'anxious', 'overwhelm'])) {
      return `It sounds like "${this.extractTopic(userMessage)}" is weighing on you. Would it help to talk through what feels most pressing right now?`;
    }

    if (this.matchesPattern(lowerMessage, ['thank', 'thanks', 'appreciate'])) {
      return "You're welcome. I'm here whenever you want to talk.";
    }

    if (this.matchesPattern(lowerMessage, ['bye', 'goodbye', 'see you'])) {
      return 'Take care of yourself. Come back anytime you want to chat.';
    }

    const earlierTurns = conversation.filter((m) => m.role === 'user').length - 1;
    if (earlierTurns > 0) {
      return `Thanks for sharing more about "${this.extractTopic(userMessage)}". How has that been affecting your day?`;
    }

    return `I hear you about "${this.extractTopic(userMessage)}". Tell me a little more about how that feels.`;
  }

  private extractTopic(message: string): string {
    // First few meaningful words
    const words = message
      .replace(/[?!.,]/g, '')
      .split(' ')
      .filter((w) => w.length > 2)
      .slice(0, 4);
    return words.join(' ') || 'that';
  }

  private matchesPattern(text: string, patterns: string[]): boolean {
    return patterns.some((pattern) => text.includes(pattern));
  }

  private matchesWord(text: string, words: string[]): boolean {
    const tokens = text.replace(/[?!.,]/g, ' ').split(/\s+/);
    return tokens.some((token) => words.includes(token));
  }

  private estimateTokens(messages: AIMessage[]): number {
    // ~4 characters per token
    const totalChars = messages.reduce((sum, m) => sum + m.content.length, 0);
    return Math.ceil(totalChars / 4);
  }

  private delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
