import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AIProvider,
  AIProviderType,
  AICompletionOptions,
  AICompletionResult,
  AIMessage,
  isAIProviderType,
} from './interfaces/ai-provider.interface';
import { MockAIProvider } from './providers/mock-ai.provider';
import { OpenAIProvider } from './providers/openai.provider';
import { GroqProvider } from './providers/groq.provider';
import { AI_DEFAULTS } from './constants/ai.constants';

@Injectable()
export class AIService implements OnModuleInit {
  private readonly logger = new Logger(AIService.name);
  private readonly providers: Map<AIProviderType, AIProvider> = new Map();
  private activeProvider: AIProvider;
  private readonly configuredProvider: string;

  constructor(
    private readonly configService: ConfigService,
    private readonly mockProvider: MockAIProvider,
    private readonly openaiProvider: OpenAIProvider,
    private readonly groqProvider: GroqProvider,
  ) {
    this.configuredProvider =
      this.configService.get<string>('AI_PROVIDER') ?? AI_DEFAULTS.PROVIDER;
    this.activeProvider = this.mockProvider;
  }

  onModuleInit(): void {
    this.registerProviders();
    this.selectActiveProvider();
  }

  private registerProviders(): void {
    this.providers.set(this.mockProvider.name, this.mockProvider);
    this.providers.set(this.openaiProvider.name, this.openaiProvider);
    this.providers.set(this.groqProvider.name, this.groqProvider);

    this.logger.log(
      `Registered ${this.providers.size} AI providers: ${Array.from(this.providers.keys()).join(', ')}`,
    );
  }

  private selectActiveProvider(): void {
    const requestedProvider = isAIProviderType(this.configuredProvider)
      ? this.providers.get(this.configuredProvider)
      : undefined;

    if (requestedProvider?.isAvailable) {
      this.activeProvider = requestedProvider;
      this.logger.log(`Using AI provider: ${this.activeProvider.name}`);
      return;
    }

    if (requestedProvider) {
      this.logger.warn(
        `Configured provider '${this.configuredProvider}' is not available. Falling back to mock provider.`,
      );
    } else {
      this.logger.warn(
        `Unknown provider '${this.configuredProvider}'. Falling back to mock provider.`,
      );
    }

    this.activeProvider = this.mockProvider;
    this.logger.log(`Using fallback AI provider: ${this.activeProvider.name}`);
  }

  get currentProvider(): AIProviderType {
    return this.activeProvider.name;
  }

  get isUsingFallback(): boolean {
    return (
      this.configuredProvider !== 'mock' && this.activeProvider.name === 'mock'
    );
  }

  getAvailableProviders(): AIProviderType[] {
    return Array.from(this.providers.entries())
      .filter(([, provider]) => provider.isAvailable)
      .map(([name]) => name);
  }

  async generateCompletion(
    messages: AIMessage[],
    options?: AICompletionOptions,
  ): Promise<AICompletionResult> {
    this.logger.debug(
      `Generating completion with ${this.activeProvider.name} for ${messages.length} messages`,
    );

    try {
      const result = await this.activeProvider.generateCompletion(
        messages,
        options,
      );
      this.logger.debug(
        `Completion generated: ${result.content.length} chars, ${result.usage?.totalTokens ?? 0} tokens`,
      );
      return result;
    } catch (error) {
      this.logger.error(
        `Completion failed with ${this.activeProvider.name}`,
        error,
      );
      throw error;
    }
  }
}
