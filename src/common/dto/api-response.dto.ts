import { HttpStatus } from '@nestjs/common';

/**
 * Envelope for every HTTP response:
 * { "data": {...}, "code": "MSG_...", "httpStatus": 200, "description": "..." }
 */
export interface ApiResponse<T = unknown> {
  data: T | null;
  code: string;
  httpStatus: HttpStatus;
  description: string;
}

export const ResponseCodes = {
  // Success codes
  SUCCESS: 'MSG_SUCCESS',
  CREATED: 'MSG_CREATED',
  DELETED: 'MSG_DELETED',

  // Health & Status
  HEALTH_OK: 'MSG_HEALTH_OK',
  HEALTH_DEGRADED: 'MSG_HEALTH_DEGRADED',
  HEALTH_UNHEALTHY: 'MSG_HEALTH_UNHEALTHY',

  // Chat
  CHAT_REPLY: 'MSG_CHAT_REPLY',
  CHAT_HISTORY: 'MSG_CHAT_HISTORY',
  SESSION_ENDED: 'MSG_SESSION_ENDED',

  // Error codes
  BAD_REQUEST: 'MSG_BAD_REQUEST',
  UNAUTHORIZED: 'MSG_UNAUTHORIZED',
  FORBIDDEN: 'MSG_FORBIDDEN',
  NOT_FOUND: 'MSG_NOT_FOUND',
  VALIDATION_ERROR: 'MSG_VALIDATION_ERROR',
  INTERNAL_ERROR: 'MSG_INTERNAL_ERROR',
  SERVICE_UNAVAILABLE: 'MSG_SERVICE_UNAVAILABLE',
} as const;

export type ResponseCode = (typeof ResponseCodes)[keyof typeof ResponseCodes];

export class ApiResponseBuilder {
  static of<T>(
    data: T,
    code: ResponseCode,
    httpStatus: HttpStatus,
    description: string,
  ): ApiResponse<T> {
    return {
      data,
      code,
      httpStatus,
      description,
    };
  }

  static error(
    code: ResponseCode,
    httpStatus: HttpStatus,
    description: string,
  ): ApiResponse<null> {
    return ApiResponseBuilder.of(null, code, httpStatus, description);
  }
}
