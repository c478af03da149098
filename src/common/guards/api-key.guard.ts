import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';
import { AuthenticatedRequest } from '../interfaces/authenticated-request.interface';

export const API_KEY_HEADER = 'x-api-key';
export const USER_ID_HEADER = 'x-user-id';

const USER_ID_PATTERN = /^[A-Za-z0-9_\-:.]{1,128}$/;

/**
 * Checks the x-api-key header against API_KEYS and takes the caller's
 * identity from x-user-id, which an upstream auth layer sets. With
 * AUTH_ENABLED=false only the user id is required.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly validApiKeys: Set<string>;
  private readonly authEnabled: boolean;

  constructor(private readonly configService: ConfigService) {
    this.authEnabled = this.configService.get<boolean>('AUTH_ENABLED', true);

    const apiKeysStr = this.configService.get<string>('API_KEYS', '');
    this.validApiKeys = new Set(
      apiKeysStr
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0),
    );

    if (this.authEnabled && this.validApiKeys.size === 0) {
      this.logger.warn(
        'API key authentication is enabled but no API keys are configured',
      );
    }
  }

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    if (this.authEnabled) {
      const apiKey = this.readHeader(request, API_KEY_HEADER);
      if (!apiKey) {
        this.logger.warn(`Request rejected: missing API key from ${request.ip}`);
        throw new UnauthorizedException('API key is required');
      }
      if (!this.validateApiKey(apiKey)) {
        this.logger.warn(`Request rejected: invalid API key from ${request.ip}`);
        throw new UnauthorizedException('Invalid API key');
      }
    }

    const userId = this.readHeader(request, USER_ID_HEADER);
    if (!userId || !USER_ID_PATTERN.test(userId)) {
      throw new UnauthorizedException('A valid x-user-id header is required');
    }

    request.user = { userId };
    return true;
  }

  private readHeader(
    request: AuthenticatedRequest,
    name: string,
  ): string | null {
    const value = request.headers[name];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
    return null;
  }

  private validateApiKey(providedKey: string): boolean {
    for (const validKey of this.validApiKeys) {
      if (this.constantTimeCompare(providedKey, validKey)) {
        return true;
      }
    }
    return false;
  }

  private constantTimeCompare(a: string, b: string): boolean {
    const left = Buffer.from(a);
    const right = Buffer.from(b);
    if (left.length !== right.length) {
      // Keep the comparison cost independent of where lengths differ
      crypto.timingSafeEqual(left, left);
      return false;
    }
    return crypto.timingSafeEqual(left, right);
  }
}
