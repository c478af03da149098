import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as admin from 'firebase-admin';

/**
 * Owns the Firebase Admin app. Credentials come from FIREBASE_CREDENTIALS_JSON
 * (cloud deployments) or FIREBASE_CREDENTIALS_PATH (local development).
 */
@Injectable()
export class FirebaseService {
  private readonly logger = new Logger(FirebaseService.name);
  private app: admin.app.App | null = null;

  constructor(private readonly configService: ConfigService) {}

  /**
   * Initialise the Admin SDK (idempotent)
   * @returns false when no credentials are configured or they are unusable
   */
  initialize(): boolean {
    if (this.app) {
      return true;
    }

    const credentialsJson = this.configService.get<string>(
      'FIREBASE_CREDENTIALS_JSON',
      '',
    );
    const credentialsPath = this.configService.get<string>(
      'FIREBASE_CREDENTIALS_PATH',
      '',
    );
    const projectId =
      this.configService.get<string>('FIREBASE_PROJECT_ID', '') || undefined;

    if (!credentialsJson && !credentialsPath) {
      this.logger.warn(
        'Firebase credentials not found. Set FIREBASE_CREDENTIALS_JSON or FIREBASE_CREDENTIALS_PATH.',
      );
      return false;
    }

    try {
      const credential = credentialsJson
        ? admin.credential.cert(JSON.parse(credentialsJson))
        : admin.credential.cert(credentialsPath);

      this.app =
        admin.apps.length > 0
          ? admin.app()
          : admin.initializeApp({ credential, projectId });

      this.logger.log(
        credentialsJson
          ? 'Firebase initialized from FIREBASE_CREDENTIALS_JSON'
          : `Firebase initialized from credentials file: ${credentialsPath}`,
      );
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to initialize Firebase: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
      return false;
    }
  }

  isInitialized(): boolean {
    return this.app !== null;
  }

  getFirestore(): admin.firestore.Firestore {
    if (!this.app) {
      throw new Error('Firebase not initialized');
    }
    return this.app.firestore();
  }
}
