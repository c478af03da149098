import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { GroqProvider } from './groq.provider';

describe('GroqProvider', () => {
  const mockConfigService = {
    get: jest.fn(),
  };

  const createProvider = async (
    config: Record<string, string | undefined>,
  ): Promise<GroqProvider> => {
    mockConfigService.get.mockImplementation((key: string) => config[key]);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GroqProvider,
        { provide: ConfigService, useValue: mockConfigService },
      ],
    }).compile();

    return module.get<GroqProvider>(GroqProvider);
  };

  let fetchSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    fetchSpy = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  it('should have name "groq"', async () => {
    const provider = await createProvider({});
    expect(provider.name).toBe('groq');
    expect(provider.isAvailable).toBe(false);
  });

  it('should call the Groq endpoint with the default model', async () => {
    const provider = await createProvider({ GROQ_API_KEY: 'test-api-key' });
    fetchSpy.mockResolvedValue(
      new Response(
        JSON.stringify({
          choices: [{ message: { content: 'Hey' }, finish_reason: 'stop' }],
        }),
        { status: 200 },
      ),
    );

    const result = await provider.generateCompletion([
      { role: 'user', content: 'Hi' },
    ]);

    expect(result.content).toBe('Hey');
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://api.groq.com/openai/v1/chat/completions');
    expect(JSON.parse(init.body)).toMatchObject({
      model: 'llama-3.1-8b-instant',
      max_tokens: 512,
      temperature: 0.7,
    });
  });

  it('should not use the OpenAI key', async () => {
    const provider = await createProvider({ OPENAI_API_KEY: 'test-api-key' });
    expect(provider.isAvailable).toBe(false);
  });
});
