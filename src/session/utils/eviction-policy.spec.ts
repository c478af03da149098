import {
  compareEvictionCandidates,
  selectEvictionVictim,
} from './eviction-policy';

describe('eviction policy', () => {
  const at = (id: string, ms: number) => ({ id, lastActivityAt: new Date(ms) });

  describe('selectEvictionVictim', () => {
    it('should return null when there are no candidates', () => {
      expect(selectEvictionVictim([])).toBeNull();
    });

    it('should pick the least recently active session', () => {
      expect(
        selectEvictionVictim([at('b', 300), at('a', 200), at('c', 100)]),
      ).toBe('c');
    });

    it('should break timestamp ties with the smaller id', () => {
      expect(selectEvictionVictim([at('s-9', 100), at('s-1', 100)])).toBe('s-1');
      expect(selectEvictionVictim([at('s-1', 100), at('s-9', 100)])).toBe('s-1');
    });

    it('should accept any iterable', () => {
      const candidates = new Map([
        ['x', at('x', 50)],
        ['y', at('y', 10)],
      ]);

      expect(selectEvictionVictim(candidates.values())).toBe('y');
    });
  });

  describe('compareEvictionCandidates', () => {
    it('should order by time then id', () => {
      const sorted = [at('b', 2), at('a', 2), at('c', 1)].sort(
        compareEvictionCandidates,
      );

      expect(sorted.map((c) => c.id)).toEqual(['c', 'a', 'b']);
    });

    it('should treat identical candidates as equal', () => {
      expect(compareEvictionCandidates(at('a', 1), at('a', 1))).toBe(0);
    });
  });
});
