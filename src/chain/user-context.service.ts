import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AIService } from '../ai/ai.service';
import { LRUCache, LRUCacheMetrics } from '../cache/lru-cache';
import {
  PROFILE_REPOSITORY,
  ProfileRepository,
} from '../profile/interfaces/profile.interface';
import {
  MOOD_SUMMARY_INSTRUCTIONS,
  buildMoodSummaryInput,
} from './prompts/companion.prompts';
import { UserContext } from './interfaces/reply-generator.interface';

export const USER_CONTEXT_DEFAULTS = {
  MOOD_LOG_LIMIT: 7,
  SUMMARY_CACHE_TTL_MS: 600000,
  SUMMARY_CACHE_MAX_SIZE: 1000,
} as const;

/**
 * Assembles the long-lived context a chain is built from: the profile
 * document and a language-model summary of the latest mood logs. Summaries
 * are cached per user.
 */
@Injectable()
export class UserContextService {
  private readonly logger = new Logger(UserContextService.name);
  private readonly summaries: LRUCache<string>;

  constructor(
    @Inject(PROFILE_REPOSITORY)
    private readonly profiles: ProfileRepository,
    private readonly aiService: AIService,
    @Optional() configService?: ConfigService,
  ) {
    this.summaries = new LRUCache<string>({
      maxSize: USER_CONTEXT_DEFAULTS.SUMMARY_CACHE_MAX_SIZE,
      ttlMs:
        configService?.get<number>('MOOD_SUMMARY_CACHE_TTL_MS') ??
        USER_CONTEXT_DEFAULTS.SUMMARY_CACHE_TTL_MS,
    });
  }

  async getContext(userId: string): Promise<UserContext> {
    const profile = await this.profiles.getUserProfile(userId);
    const moodSummary = await this.getMoodSummary(userId);
    return { userId, profile, moodSummary };
  }

  /** Empty when the user has no logs or summarising fails */
  async getMoodSummary(userId: string): Promise<string> {
    const cached = this.summaries.get(userId);
    if (cached !== undefined) {
      return cached;
    }

    const logs = await this.profiles.getRecentMoodLogs(
      userId,
      USER_CONTEXT_DEFAULTS.MOOD_LOG_LIMIT,
    );
    if (logs.length === 0) {
      return '';
    }

    try {
      const result = await this.aiService.generateCompletion([
        { role: 'system', content: MOOD_SUMMARY_INSTRUCTIONS },
        { role: 'user', content: buildMoodSummaryInput(logs) },
      ]);
      const summary = result.content.trim();
      this.summaries.set(userId, summary);
      return summary;
    } catch (error) {
      this.logger.warn(
        `Mood summary failed for user ${userId}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return '';
    }
  }

  getCacheMetrics(): LRUCacheMetrics {
    return this.summaries.getMetrics();
  }
}
