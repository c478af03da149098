/**
 * Eviction victim selection for a user's cached sessions.
 *
 * The victim is the session idle the longest (minimum lastActivityAt). Equal
 * timestamps fall back to the lexicographically smaller id, so the choice is
 * reproducible for any iteration order.
 */

export interface EvictionCandidate {
  id: string;
  lastActivityAt: Date;
}

export function compareEvictionCandidates(
  a: EvictionCandidate,
  b: EvictionCandidate,
): number {
  const delta = a.lastActivityAt.getTime() - b.lastActivityAt.getTime();
  if (delta !== 0) {
    return delta;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

export function selectEvictionVictim(
  candidates: Iterable<EvictionCandidate>,
): string | null {
  let victim: EvictionCandidate | null = null;

  for (const candidate of candidates) {
    if (!victim || compareEvictionCandidates(candidate, victim) < 0) {
      victim = candidate;
    }
  }

  return victim?.id ?? null;
}
