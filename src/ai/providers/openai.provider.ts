import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatCompletionsProvider } from './chat-completions.provider';
import { AI_DEFAULTS } from '../constants/ai.constants';

/**
 * OpenAI provider. Enable with AI_PROVIDER=openai and OPENAI_API_KEY.
 */
@Injectable()
export class OpenAIProvider extends ChatCompletionsProvider {
  constructor(configService: ConfigService) {
    super(configService, {
      name: 'openai',
      baseUrl: 'https://api.openai.com/v1',
      apiKeyVariable: 'OPENAI_API_KEY',
      modelVariable: 'OPENAI_MODEL',
      defaultModel: AI_DEFAULTS.OPENAI_MODEL,
    });
  }
}
