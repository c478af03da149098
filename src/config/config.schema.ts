import * as Joi from 'joi';

export const configValidationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().default(3000),
  CORS_ORIGIN: Joi.string().default('*'),

  SESSION_MAX_PER_USER: Joi.number().integer().min(1).default(2),
  SESSION_MAX_HISTORY: Joi.number().integer().min(0).default(25),
  CHAT_MAX_MESSAGE_LENGTH: Joi.number().integer().min(1).default(1000),

  PERSISTENCE_CONCURRENCY: Joi.number().integer().min(1).default(4),
  PERSISTENCE_MAX_QUEUE: Joi.number().integer().min(1).default(1000),
  PERSISTENCE_SHUTDOWN_TIMEOUT_MS: Joi.number().integer().min(0).default(5000),

  TURN_STORE_DRIVER: Joi.string()
    .valid('firestore', 'redis', 'memory')
    .default('memory'),
  FIREBASE_CREDENTIALS_JSON: Joi.string().allow('').optional(),
  FIREBASE_CREDENTIALS_PATH: Joi.string().allow('').optional(),
  FIREBASE_PROJECT_ID: Joi.string().allow('').optional(),
  REDIS_HOST: Joi.string().default('localhost'),
  REDIS_PORT: Joi.number().default(6379),
  REDIS_PASSWORD: Joi.string().allow('').default(''),
  REDIS_DB: Joi.number().integer().min(0).default(0),
  REDIS_KEY_PREFIX: Joi.string().default('companion:'),

  AI_PROVIDER: Joi.string().valid('mock', 'openai', 'groq').default('mock'),
  OPENAI_API_KEY: Joi.string().allow('').optional(),
  OPENAI_MODEL: Joi.string().optional(),
  GROQ_API_KEY: Joi.string().allow('').optional(),
  GROQ_MODEL: Joi.string().optional(),
  AI_MAX_TOKENS: Joi.number().integer().min(1).optional(),
  AI_TEMPERATURE: Joi.number().min(0).max(2).optional(),
  AI_MOCK_RESPONSE_DELAY_MS: Joi.number().integer().min(0).default(0),
  MOOD_SUMMARY_CACHE_TTL_MS: Joi.number().integer().min(0).default(600000),

  AUTH_ENABLED: Joi.boolean().default(true),
  API_KEYS: Joi.string().allow('').default(''),
  LOG_HTTP_REQUESTS: Joi.boolean().default(true),
  LOG_FORMAT: Joi.string().valid('json', 'text').default('json'),
});
