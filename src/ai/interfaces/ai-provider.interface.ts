export type AIProviderType = 'mock' | 'openai' | 'groq';

export type AIMessageRole = 'system' | 'user' | 'assistant';

export interface AIMessage {
  role: AIMessageRole;
  content: string;
}

export interface AICompletionOptions {
  maxTokens?: number;
  temperature?: number;
}

export interface AICompletionResult {
  content: string;
  finishReason: 'stop' | 'length' | 'error';
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export interface AIProvider {
  readonly name: AIProviderType;
  readonly isAvailable: boolean;

  generateCompletion(
    messages: AIMessage[],
    options?: AICompletionOptions,
  ): Promise<AICompletionResult>;
}

export function isAIProviderType(value: unknown): value is AIProviderType {
  return value === 'mock' || value === 'openai' || value === 'groq';
}
