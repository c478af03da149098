import { InMemoryProfileRepository } from './in-memory-profile.repository';

describe('InMemoryProfileRepository', () => {
  let repository: InMemoryProfileRepository;

  beforeEach(() => {
    repository = new InMemoryProfileRepository();
  });

  it('should return saved profiles as copies', async () => {
    repository.saveProfile('user-1', { displayName: 'Sam', goals: ['rest'] });

    const profile = await repository.getUserProfile('user-1');
    profile?.goals.push('mutated');

    await expect(repository.getUserProfile('user-1')).resolves.toEqual({
      displayName: 'Sam',
      goals: ['rest'],
    });
  });

  it('should return mood logs newest first', async () => {
    repository.addMoodLog('user-1', { date: '2026-01-01' });
    repository.addMoodLog('user-1', { date: '2026-01-03' });
    repository.addMoodLog('user-1', { date: '2026-01-02' });

    const logs = await repository.getRecentMoodLogs('user-1', 2);

    expect(logs.map((entry) => entry.date)).toEqual(['2026-01-03', '2026-01-02']);
  });

  it('should forget everything on clear', async () => {
    repository.saveProfile('user-1', { goals: [] });
    repository.addMoodLog('user-1', { date: '2026-01-01' });

    repository.clear();

    await expect(repository.getUserProfile('user-1')).resolves.toBeNull();
    await expect(repository.getRecentMoodLogs('user-1', 7)).resolves.toEqual([]);
  });
});
