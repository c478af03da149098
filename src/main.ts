import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger, INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { ResponseInterceptor } from './common/interceptors/response.interceptor';
import { HttpExceptionFilter } from './common/filters/http-exception.filter';

export function configureApp(app: INestApplication): void {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  // Standard response format for all HTTP responses
  app.useGlobalInterceptors(new ResponseInterceptor());

  // Standard error format for all exceptions
  app.useGlobalFilters(new HttpExceptionFilter());
}

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);

  const configService = app.get(ConfigService);
  const port = configService.get<number>('PORT', 3000);

  configureApp(app);
  app.enableCors({
    origin: configService.get<string>('CORS_ORIGIN', '*'),
    credentials: true,
  });

  // Lets the persistence writer drain on SIGTERM
  app.enableShutdownHooks();

  await app.listen(port);
  logger.log(`Application is running on: http://localhost:${port}`);
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    new Logger('Bootstrap').error(
      'Failed to start application',
      error instanceof Error ? error.stack : undefined,
    );
    process.exit(1);
  });
}
