import { Injectable } from '@nestjs/common';
import {
  MoodLogEntry,
  ProfileRepository,
  UserProfile,
} from '../interfaces/profile.interface';

@Injectable()
export class InMemoryProfileRepository implements ProfileRepository {
  private readonly profiles = new Map<string, UserProfile>();
  private readonly moodLogs = new Map<string, MoodLogEntry[]>();

  async getUserProfile(userId: string): Promise<UserProfile | null> {
    const profile = this.profiles.get(userId);
    return profile ? { ...profile, goals: [...profile.goals] } : null;
  }

  async getRecentMoodLogs(
    userId: string,
    limit: number,
  ): Promise<MoodLogEntry[]> {
    const logs = this.moodLogs.get(userId) ?? [];
    return [...logs]
      .sort((a, b) => b.date.localeCompare(a.date))
      .slice(0, Math.max(0, limit));
  }

  saveProfile(userId: string, profile: UserProfile): void {
    this.profiles.set(userId, profile);
  }

  addMoodLog(userId: string, entry: MoodLogEntry): void {
    const logs = this.moodLogs.get(userId) ?? [];
    logs.push(entry);
    this.moodLogs.set(userId, logs);
  }

  clear(): void {
    this.profiles.clear();
    this.moodLogs.clear();
  }
}
