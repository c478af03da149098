import { Injectable, NestMiddleware, Logger, Optional } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { ConfigService } from '@nestjs/config';

export interface LogEntry {
  timestamp: string;
  method: string;
  url: string;
  statusCode: number;
  responseTime: number;
  userId?: string;
  userAgent?: string;
  ip?: string;
  status: 'success' | 'error';
}

type LogFormat = 'json' | 'text';

@Injectable()
export class LoggingMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');
  private readonly enabled: boolean;
  private readonly format: LogFormat;

  constructor(@Optional() private readonly configService?: ConfigService) {
    this.enabled =
      configService?.get<boolean>('LOG_HTTP_REQUESTS', true) ?? true;
    this.format =
      configService?.get<string>('LOG_FORMAT', 'json') === 'text'
        ? 'text'
        : 'json';
  }

  use(req: Request, res: Response, next: NextFunction): void {
    if (!this.enabled) {
      next();
      return;
    }

    const startTime = Date.now();

    res.on('finish', () => {
      const userId = req.get('x-user-id');
      this.logRequest({
        timestamp: new Date().toISOString(),
        method: req.method,
        url: req.originalUrl || req.url,
        statusCode: res.statusCode,
        responseTime: Date.now() - startTime,
        userId: userId || undefined,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
        status: res.statusCode >= 400 ? 'error' : 'success',
      });
    });

    next();
  }

  private logRequest(entry: LogEntry): void {
    if (this.format === 'json') {
      this.logger.log(JSON.stringify(entry));
      return;
    }

    const message = `${entry.method} ${entry.url} ${entry.statusCode} ${entry.responseTime}ms`;
    if (entry.status === 'error') {
      this.logger.warn(message);
    } else {
      this.logger.log(message);
    }
  }
}
