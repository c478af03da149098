import { InMemoryTurnStoreAdapter } from './in-memory-turn-store.adapter';

describe('InMemoryTurnStoreAdapter', () => {
  let adapter: InMemoryTurnStoreAdapter;

  const turn = (turnNumber: number) => ({
    turnNumber,
    userMessage: `u${turnNumber}`,
    assistantMessage: `a${turnNumber}`,
    timestamp: new Date(1_000 * turnNumber),
  });

  beforeEach(() => {
    adapter = new InMemoryTurnStoreAdapter();
  });

  it('should return the last turns in append order', async () => {
    for (let i = 0; i < 4; i++) {
      await adapter.appendTurn('user-1', 'session-1', turn(i));
    }

    const turns = await adapter.loadTurns('user-1', 'session-1', 2);

    expect(turns).toEqual([
      {
        turnNumber: 2,
        timestamp: new Date(2_000),
        messages: [
          { role: 'user', content: 'u2' },
          { role: 'assistant', content: 'a2' },
        ],
      },
      {
        turnNumber: 3,
        timestamp: new Date(3_000),
        messages: [
          { role: 'user', content: 'u3' },
          { role: 'assistant', content: 'a3' },
        ],
      },
    ]);
  });

  it('should return empty for unknown sessions and non-positive limits', async () => {
    await adapter.appendTurn('user-1', 'session-1', turn(0));

    await expect(adapter.loadTurns('user-1', 'other', 5)).resolves.toEqual([]);
    await expect(adapter.loadTurns('user-1', 'session-1', 0)).resolves.toEqual([]);
  });

  it('should hand out copies', async () => {
    await adapter.appendTurn('user-1', 'session-1', turn(0));
    const [first] = await adapter.loadTurns('user-1', 'session-1', 1);
    if (typeof first === 'object' && first !== null && 'messages' in first) {
      first.messages = [];
    }

    const [again] = await adapter.loadTurns('user-1', 'session-1', 1);
    expect(again).toMatchObject({ messages: [{ role: 'user', content: 'u0' }, { role: 'assistant', content: 'a0' }] });
  });

  it('should track session metadata', async () => {
    const createdAt = new Date(1_000);
    const lastActivity = new Date(2_000);
    const endedAt = new Date(3_000);

    await adapter.createSessionMetadata('user-1', 'session-1', createdAt);
    await adapter.updateSessionActivity('user-1', 'session-1', lastActivity);
    await adapter.markSessionEnded('user-1', 'session-1', endedAt);

    await expect(
      adapter.getSessionMetadata('user-1', 'session-1'),
    ).resolves.toEqual({
      sessionId: 'session-1',
      userId: 'user-1',
      status: 'ended',
      createdAt,
      lastActivity,
      endedAt,
    });
  });

  it('should not overwrite a later activity on creation', async () => {
    await adapter.updateSessionActivity('user-1', 'session-1', new Date(5_000));
    await adapter.createSessionMetadata('user-1', 'session-1', new Date(1_000));

    const metadata = await adapter.getSessionMetadata('user-1', 'session-1');
    expect(metadata?.lastActivity).toEqual(new Date(5_000));
  });

  it('should clear everything', async () => {
    await adapter.appendTurn('user-1', 'session-1', turn(0));
    await adapter.clear();

    await expect(adapter.getSessionMetadata('user-1', 'session-1')).resolves.toBeNull();
    expect(adapter.getType()).toBe('memory');
  });
});
