import { MoodLogEntry, UserProfile } from '../interfaces/profile.interface';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0
    ? value.trim()
    : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function parseUserProfile(data: unknown): UserProfile | null {
  if (!isRecord(data)) {
    return null;
  }

  const goals = Array.isArray(data.goals)
    ? data.goals.filter((g): g is string => typeof g === 'string' && g.length > 0)
    : [];

  return {
    displayName: optionalString(data.display_name) ?? optionalString(data.name),
    age: optionalNumber(data.age),
    occupation: optionalString(data.occupation),
    goals,
  };
}

/**
 * Mood log documents carry scores under `core_scores`; entries without a
 * date are unusable for summaries and yield null.
 */
export function parseMoodLog(data: unknown): MoodLogEntry | null {
  if (!isRecord(data)) {
    return null;
  }

  const date = optionalString(data.date);
  if (!date) {
    return null;
  }

  const core = isRecord(data.core_scores) ? data.core_scores : {};
  return {
    date,
    mood: optionalNumber(core.mood),
    energy: optionalNumber(core.energy),
    sleep: optionalNumber(core.sleep),
    stress: optionalNumber(core.stress),
    notes: optionalString(data.additional_notes),
  };
}
