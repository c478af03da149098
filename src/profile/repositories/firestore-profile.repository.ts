import { Injectable } from '@nestjs/common';
import { FirebaseService } from '../../firebase/firebase.service';
import { FIRESTORE_COLLECTIONS } from '../../storage/adapters/firestore-turn-store.adapter';
import {
  MoodLogEntry,
  ProfileRepository,
  UserProfile,
} from '../interfaces/profile.interface';
import { parseMoodLog, parseUserProfile } from './profile-document.parser';

export const MOOD_LOGS_COLLECTION = 'user_mood_logs';

@Injectable()
export class FirestoreProfileRepository implements ProfileRepository {
  constructor(private readonly firebaseService: FirebaseService) {}

  async getUserProfile(userId: string): Promise<UserProfile | null> {
    const snapshot = await this.firebaseService
      .getFirestore()
      .collection(FIRESTORE_COLLECTIONS.USERS)
      .doc(userId)
      .get();

    return snapshot.exists ? parseUserProfile(snapshot.data()) : null;
  }

  async getRecentMoodLogs(
    userId: string,
    limit: number,
  ): Promise<MoodLogEntry[]> {
    const snapshot = await this.firebaseService
      .getFirestore()
      .collection(MOOD_LOGS_COLLECTION)
      .where('user_id', '==', userId)
      .orderBy('submitted_at', 'desc')
      .limit(limit)
      .get();

    return snapshot.docs
      .map((doc) => parseMoodLog(doc.data()))
      .filter((entry): entry is MoodLogEntry => entry !== null);
  }
}
