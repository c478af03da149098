import { ConversationChain } from './conversation-chain';
import { AIService } from '../ai/ai.service';
import { ChatMessageDto, MessageRole } from '../session/dto/chat-message.dto';
import { AI_ERRORS } from '../ai/constants/ai.constants';

describe('ConversationChain', () => {
  let mockAIService: { generateCompletion: jest.Mock };
  let chain: ConversationChain;

  beforeEach(() => {
    mockAIService = {
      generateCompletion: jest
        .fn()
        .mockResolvedValue({ content: '  That sounds hard.  ', finishReason: 'stop' }),
    };
    chain = new ConversationChain(
      mockAIService as unknown as AIService,
      'system prompt',
    );
  });

  it('should send the system prompt, the history and the new message in order', async () => {
    const history = [
      new ChatMessageDto(MessageRole.USER, 'hi', 1),
      new ChatMessageDto(MessageRole.ASSISTANT, 'hello', 1),
    ];

    await chain.generate('I had a long day', history);

    expect(mockAIService.generateCompletion).toHaveBeenCalledWith([
      { role: 'system', content: 'system prompt' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello' },
      { role: 'user', content: 'I had a long day' },
    ]);
  });

  it('should return the trimmed reply', async () => {
    await expect(chain.generate('hey', [])).resolves.toBe('That sounds hard.');
  });

  it('should reject an empty completion', async () => {
    mockAIService.generateCompletion.mockResolvedValue({
      content: '   ',
      finishReason: 'stop',
    });

    await expect(chain.generate('hey', [])).rejects.toThrow(
      AI_ERRORS.EMPTY_COMPLETION,
    );
  });

  it('should propagate provider failures', async () => {
    mockAIService.generateCompletion.mockRejectedValue(new Error('timeout'));

    await expect(chain.generate('hey', [])).rejects.toThrow('timeout');
  });

  it('should not keep state between calls', async () => {
    await chain.generate('first', []);
    await chain.generate('second', []);

    expect(mockAIService.generateCompletion).toHaveBeenLastCalledWith([
      { role: 'system', content: 'system prompt' },
      { role: 'user', content: 'second' },
    ]);
    expect(chain.getSystemPrompt()).toBe('system prompt');
  });
});
