import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AICompletionOptions,
  AICompletionResult,
  AIMessage,
  AIProvider,
  AIProviderType,
} from '../interfaces/ai-provider.interface';
import { AI_DEFAULTS, AI_ERRORS } from '../constants/ai.constants';

export interface ChatCompletionsSettings {
  name: AIProviderType;
  baseUrl: string;
  apiKeyVariable: string;
  modelVariable: string;
  defaultModel: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toNumber(value: unknown): number {
  return typeof value === 'number' ? value : 0;
}

/**
 * Base for providers speaking the OpenAI chat completions wire format
 */
export abstract class ChatCompletionsProvider implements AIProvider {
  readonly name: AIProviderType;
  protected readonly logger: Logger;
  private readonly apiKey: string | undefined;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly baseUrl: string;

  protected constructor(
    configService: ConfigService,
    settings: ChatCompletionsSettings,
  ) {
    this.name = settings.name;
    this.baseUrl = settings.baseUrl;
    this.logger = new Logger(this.constructor.name);
    this.apiKey = configService.get<string>(settings.apiKeyVariable) || undefined;
    this.model =
      configService.get<string>(settings.modelVariable) || settings.defaultModel;

    const maxTokensValue = configService.get<string | number>('AI_MAX_TOKENS');
    this.maxTokens = maxTokensValue
      ? parseInt(String(maxTokensValue), 10)
      : AI_DEFAULTS.MAX_TOKENS;
    const tempValue = configService.get<string | number>('AI_TEMPERATURE');
    this.temperature =
      tempValue !== undefined && tempValue !== ''
        ? parseFloat(String(tempValue))
        : AI_DEFAULTS.TEMPERATURE;

    if (this.apiKey) {
      this.logger.log(`${this.name} provider initialized with model: ${this.model}`);
    } else {
      this.logger.warn(
        `${settings.apiKeyVariable} not configured. Provider will be unavailable.`,
      );
    }
  }

  get isAvailable(): boolean {
    return !!this.apiKey;
  }

  async generateCompletion(
    messages: AIMessage[],
    options?: AICompletionOptions,
  ): Promise<AICompletionResult> {
    if (!this.apiKey) {
      throw new Error(
        `${AI_ERRORS.PROVIDER_NOT_AVAILABLE}: ${this.name} API key not configured`,
      );
    }

    this.logger.debug(
      `Generating ${this.name} completion for ${messages.length} messages`,
    );

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          max_tokens: Math.floor(options?.maxTokens ?? this.maxTokens),
          temperature: options?.temperature ?? this.temperature,
          stream: false,
        }),
      });

      if (!response.ok) {
        const error = await response.text();
        this.logger.error(`${this.name} API error: ${response.status} - ${error}`);
        throw new Error(`${this.name} API error: ${response.status}`);
      }

      return this.parseCompletion(await response.json());
    } catch (error) {
      this.logger.error(`${this.name} completion failed`, error);
      throw error;
    }
  }

  private parseCompletion(data: unknown): AICompletionResult {
    const choices = isRecord(data) ? data.choices : undefined;
    const choice = Array.isArray(choices) ? choices[0] : undefined;
    const message = isRecord(choice) ? choice.message : undefined;
    const content =
      isRecord(message) && typeof message.content === 'string'
        ? message.content
        : '';
    const finish = isRecord(choice) ? choice.finish_reason : undefined;
    const usage = isRecord(data) && isRecord(data.usage) ? data.usage : {};

    return {
      content,
      finishReason: finish === 'length' ? 'length' : 'stop',
      usage: {
        promptTokens: toNumber(usage.prompt_tokens),
        completionTokens: toNumber(usage.completion_tokens),
        totalTokens: toNumber(usage.total_tokens),
      },
    };
  }
}
