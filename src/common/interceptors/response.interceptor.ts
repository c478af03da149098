import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';
import {
  ApiResponse,
  ApiResponseBuilder,
  ResponseCode,
  ResponseCodes,
} from '../dto/api-response.dto';

interface ResponseMeta {
  code: ResponseCode;
  description: string;
}

function readStatus(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'status' in data) {
    return typeof data.status === 'string' ? data.status : undefined;
  }
  return undefined;
}

/**
 * Wraps controller results in the standard envelope. The code is derived
 * from the route: chat replies, history reads, session deletion and health.
 */
@Injectable()
export class ResponseInterceptor<T>
  implements NestInterceptor<T, ApiResponse<T | null>>
{
  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiResponse<T | null>> {
    const ctx = context.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    return next.handle().pipe(
      map((data) => {
        const statusCode = response.statusCode || HttpStatus.OK;
        const { code, description } = this.getResponseMeta(
          request.method,
          request.url,
          data,
        );
        return ApiResponseBuilder.of(data ?? null, code, statusCode, description);
      }),
    );
  }

  private getResponseMeta(
    method: string,
    url: string,
    data: unknown,
  ): ResponseMeta {
    if (url.startsWith('/health')) {
      return this.getHealthMeta(readStatus(data));
    }

    if (url.startsWith('/api/chat/message') && method === 'POST') {
      return { code: ResponseCodes.CHAT_REPLY, description: 'Reply generated' };
    }

    if (url.includes('/history') && method === 'GET') {
      return {
        code: ResponseCodes.CHAT_HISTORY,
        description: 'Conversation history retrieved',
      };
    }

    if (url.startsWith('/api/chat/sessions') && method === 'DELETE') {
      return { code: ResponseCodes.SESSION_ENDED, description: 'Session ended' };
    }

    if (method === 'DELETE') {
      return {
        code: ResponseCodes.DELETED,
        description: 'Resource deleted successfully',
      };
    }

    return {
      code: method === 'POST' ? ResponseCodes.CREATED : ResponseCodes.SUCCESS,
      description:
        method === 'POST'
          ? 'Resource created successfully'
          : 'Request processed successfully',
    };
  }

  private getHealthMeta(status: string | undefined): ResponseMeta {
    switch (status) {
      case undefined:
      case 'ok':
      case 'healthy':
        return { code: ResponseCodes.HEALTH_OK, description: 'Service is healthy' };
      case 'degraded':
        return {
          code: ResponseCodes.HEALTH_DEGRADED,
          description: 'Service is running with degraded performance',
        };
      default:
        return {
          code: ResponseCodes.HEALTH_UNHEALTHY,
          description: 'Service is unhealthy',
        };
    }
  }
}
