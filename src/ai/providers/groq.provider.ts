import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatCompletionsProvider } from './chat-completions.provider';
import { AI_DEFAULTS } from '../constants/ai.constants';

/**
 * Groq provider (OpenAI-compatible endpoint)
 *
 * Models: llama-3.1-8b-instant, llama-3.1-70b-versatile, mixtral-8x7b-32768
 */
@Injectable()
export class GroqProvider extends ChatCompletionsProvider {
  constructor(configService: ConfigService) {
    super(configService, {
      name: 'groq',
      baseUrl: 'https://api.groq.com/openai/v1',
      apiKeyVariable: 'GROQ_API_KEY',
      modelVariable: 'GROQ_MODEL',
      defaultModel: AI_DEFAULTS.GROQ_MODEL,
    });
  }
}
