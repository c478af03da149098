import {
  MoodLogEntry,
  UserProfile,
} from '../../profile/interfaces/profile.interface';
import { UserContext } from '../interfaces/reply-generator.interface';

const COMPANION_PERSONA = [
  'You are a warm, supportive wellbeing companion.',
  'Listen carefully, reflect feelings back, and ask gentle follow-up questions.',
  'Keep replies short and conversational. Do not diagnose or give medical advice.',
].join(' ');

export const MOOD_SUMMARY_INSTRUCTIONS =
  'Summarize the following mood logs in two or three sentences, ' +
  'describing the overall trend in mood, energy, sleep and stress. ' +
  'Address the summary to a counsellor, not to the user.';

function describeProfile(profile: UserProfile): string[] {
  const lines: string[] = [];
  if (profile.displayName) lines.push(`Name: ${profile.displayName}`);
  if (profile.age !== undefined) lines.push(`Age: ${profile.age}`);
  if (profile.occupation) lines.push(`Occupation: ${profile.occupation}`);
  if (profile.goals.length > 0) lines.push(`Goals: ${profile.goals.join(', ')}`);
  return lines;
}

export function buildSystemPrompt(context: UserContext): string {
  const sections = [COMPANION_PERSONA];

  const profileLines = context.profile ? describeProfile(context.profile) : [];
  if (profileLines.length > 0) {
    sections.push(`About the user:\n${profileLines.join('\n')}`);
  }
  if (context.moodSummary) {
    sections.push(`Recent mood: ${context.moodSummary}`);
  }

  return sections.join('\n\n');
}

function score(label: string, value: number | undefined): string | null {
  return value === undefined ? null : `${label} ${value}/5`;
}

export function formatMoodLog(entry: MoodLogEntry): string {
  const parts = [
    score('mood', entry.mood),
    score('energy', entry.energy),
    score('sleep', entry.sleep),
    score('stress', entry.stress),
  ].filter((part): part is string => part !== null);

  const line = `${entry.date}: ${parts.length > 0 ? parts.join(', ') : 'no scores'}`;
  return entry.notes ? `${line}. Notes: ${entry.notes}` : line;
}

export function buildMoodSummaryInput(logs: readonly MoodLogEntry[]): string {
  return logs.map(formatMoodLog).join('\n');
}
