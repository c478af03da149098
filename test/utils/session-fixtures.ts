import { ReplyGenerator } from '../../src/chain/interfaces/reply-generator.interface';
import { Session } from '../../src/session/interfaces/session.interface';

export function createStubChain(reply = 'stub reply'): ReplyGenerator {
  return { generate: jest.fn().mockResolvedValue(reply) };
}

export function createSession(
  id: string,
  lastActivityMs: number,
  overrides: Partial<Session> = {},
): Session {
  return {
    id,
    userId: 'user-1',
    createdAt: new Date(lastActivityMs),
    lastActivityAt: new Date(lastActivityMs),
    messageCount: 0,
    status: 'active',
    chain: createStubChain(),
    ...overrides,
  };
}
