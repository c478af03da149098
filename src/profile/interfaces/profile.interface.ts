export const PROFILE_REPOSITORY = Symbol('PROFILE_REPOSITORY');

export interface UserProfile {
  displayName?: string;
  age?: number;
  occupation?: string;
  goals: string[];
}

/** Core scores are on a 1-5 scale */
export interface MoodLogEntry {
  date: string;
  mood?: number;
  energy?: number;
  sleep?: number;
  stress?: number;
  notes?: string;
}

export interface ProfileRepository {
  getUserProfile(userId: string): Promise<UserProfile | null>;
  /** Newest first */
  getRecentMoodLogs(userId: string, limit: number): Promise<MoodLogEntry[]>;
}
