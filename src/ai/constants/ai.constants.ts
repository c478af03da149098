export const AI_DEFAULTS = {
  PROVIDER: 'mock',
  OPENAI_MODEL: 'gpt-4o-mini',
  GROQ_MODEL: 'llama-3.1-8b-instant',
  MAX_TOKENS: 512,
  TEMPERATURE: 0.7,
  MOCK_RESPONSE_DELAY_MS: 0,
} as const;

export const AI_ERRORS = {
  PROVIDER_NOT_AVAILABLE: 'AI provider is not available',
  EMPTY_COMPLETION: 'AI provider returned an empty completion',
} as const;
