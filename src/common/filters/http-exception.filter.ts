import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import {
  ApiResponseBuilder,
  ResponseCodes,
  ResponseCode,
} from '../dto/api-response.dto';
import { SessionUnavailableError } from '../../session/errors/session-unavailable.error';

interface ResolvedError {
  status: number;
  code: ResponseCode;
  message: string;
}

/**
 * Formats every exception as { data: null, code, httpStatus, description }.
 * SessionUnavailableError becomes a 503 without going through HttpException.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const { status, code, message } = this.resolve(exception);
    const description = this.sanitizeMessage(message, status);

    this.logger.warn(
      `HTTP ${status} ${request.method} ${request.url} - ${code}: ${description}`,
    );

    response
      .status(status)
      .json(ApiResponseBuilder.error(code, status, description));
  }

  private resolve(exception: unknown): ResolvedError {
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      const body = exception.getResponse();

      if (typeof body === 'string') {
        return { status, code: this.getErrorCode(status), message: body };
      }

      const bodyMessage: unknown =
        typeof body === 'object' && body !== null && 'message' in body
          ? body.message
          : undefined;

      // class-validator reports one message per failed constraint
      if (Array.isArray(bodyMessage)) {
        return {
          status,
          code: ResponseCodes.VALIDATION_ERROR,
          message: bodyMessage.map(String).join('; '),
        };
      }

      return {
        status,
        code: this.getErrorCode(status),
        message:
          typeof bodyMessage === 'string' && bodyMessage
            ? bodyMessage
            : exception.message,
      };
    }

    if (exception instanceof SessionUnavailableError) {
      return {
        status: HttpStatus.SERVICE_UNAVAILABLE,
        code: ResponseCodes.SERVICE_UNAVAILABLE,
        message: exception.message,
      };
    }

    if (exception instanceof Error) {
      this.logger.error(`Unhandled error: ${exception.message}`, exception.stack);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        code: ResponseCodes.INTERNAL_ERROR,
        message: exception.message,
      };
    }

    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      code: ResponseCodes.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
    };
  }

  private getErrorCode(status: number): ResponseCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ResponseCodes.BAD_REQUEST;
      case HttpStatus.UNAUTHORIZED:
        return ResponseCodes.UNAUTHORIZED;
      case HttpStatus.FORBIDDEN:
        return ResponseCodes.FORBIDDEN;
      case HttpStatus.NOT_FOUND:
        return ResponseCodes.NOT_FOUND;
      case HttpStatus.UNPROCESSABLE_ENTITY:
        return ResponseCodes.VALIDATION_ERROR;
      case HttpStatus.SERVICE_UNAVAILABLE:
        return ResponseCodes.SERVICE_UNAVAILABLE;
      default:
        return ResponseCodes.INTERNAL_ERROR;
    }
  }

  private sanitizeMessage(message: string, status: number): string {
    if (
      process.env.NODE_ENV === 'production' &&
      status === HttpStatus.INTERNAL_SERVER_ERROR
    ) {
      return 'An internal server error occurred. Please try again later.';
    }

    // Strip stack frames and source paths
    return message
      .replace(/at .+\(.+\)/g, '')
      .replace(/\/[a-zA-Z0-9_\-\/]+\.ts:\d+:\d+/g, '')
      .trim();
  }
}
