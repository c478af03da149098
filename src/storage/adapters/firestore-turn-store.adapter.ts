import { Injectable, Logger } from '@nestjs/common';
import type { firestore } from 'firebase-admin';
import { FirebaseService } from '../../firebase/firebase.service';
import {
  RawTurnRecord,
  TurnRecord,
  TurnStore,
} from '../interfaces/turn-store.interface';
import { toStoredTurn } from '../utils/stored-turn';

export const FIRESTORE_COLLECTIONS = {
  USERS: 'users',
  CHAT_SESSIONS: 'chat_sessions',
  TURNS: 'turns',
} as const;

/**
 * Firestore layout:
 *   users/{userId}/chat_sessions/{sessionId}          session metadata
 *   users/{userId}/chat_sessions/{sessionId}/turns/*  one document per turn
 *
 * Metadata writes merge, so an activity update that lands before the creation
 * write still leaves a usable document.
 */
@Injectable()
export class FirestoreTurnStoreAdapter implements TurnStore {
  private readonly logger = new Logger(FirestoreTurnStoreAdapter.name);

  constructor(private readonly firebaseService: FirebaseService) {}

  async connect(): Promise<boolean> {
    return this.firebaseService.initialize();
  }

  async appendTurn(
    userId: string,
    sessionId: string,
    turn: TurnRecord,
  ): Promise<void> {
    await this.getSessionDoc(userId, sessionId)
      .collection(FIRESTORE_COLLECTIONS.TURNS)
      .add(toStoredTurn(turn));
  }

  async loadTurns(
    userId: string,
    sessionId: string,
    limit: number,
  ): Promise<RawTurnRecord[]> {
    if (limit <= 0) {
      return [];
    }

    const snapshot = await this.getSessionDoc(userId, sessionId)
      .collection(FIRESTORE_COLLECTIONS.TURNS)
      .orderBy('timestamp', 'desc')
      .limit(limit)
      .get();

    return snapshot.docs.map((doc) => doc.data()).reverse();
  }

  async createSessionMetadata(
    userId: string,
    sessionId: string,
    createdAt: Date,
  ): Promise<void> {
    await this.getSessionDoc(userId, sessionId).set(
      {
        sessionId,
        userId,
        status: 'active',
        createdAt,
        lastActivity: createdAt,
      },
      { merge: true },
    );
  }

  async updateSessionActivity(
    userId: string,
    sessionId: string,
    lastActivity: Date,
  ): Promise<void> {
    await this.getSessionDoc(userId, sessionId).set(
      { lastActivity },
      { merge: true },
    );
  }

  async markSessionEnded(
    userId: string,
    sessionId: string,
    endedAt: Date,
  ): Promise<void> {
    await this.getSessionDoc(userId, sessionId).set(
      { status: 'ended', endedAt },
      { merge: true },
    );
    this.logger.debug(`Session ${sessionId.slice(0, 8)} marked ended`);
  }

  async isHealthy(): Promise<boolean> {
    if (!this.firebaseService.isInitialized()) {
      return false;
    }

    try {
      await this.firebaseService
        .getFirestore()
        .collection(FIRESTORE_COLLECTIONS.USERS)
        .limit(1)
        .get();
      return true;
    } catch {
      return false;
    }
  }

  getType(): string {
    return 'firestore';
  }

  private getSessionDoc(
    userId: string,
    sessionId: string,
  ): firestore.DocumentReference {
    return this.firebaseService
      .getFirestore()
      .collection(FIRESTORE_COLLECTIONS.USERS)
      .doc(userId)
      .collection(FIRESTORE_COLLECTIONS.CHAT_SESSIONS)
      .doc(sessionId);
  }
}
