import { ValidationPipe } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import cookieParser from 'cookie-parser';
import type { AppConfig } from './config/app.config';

/**
 * HTTP middleware and global pipes, shared by main.ts and the e2e tests
 */
export function configureApp(app: NestExpressApplication, config: AppConfig): void {
  if (config.http.trustProxy) {
    app.set('trust proxy', true);
  }

  app.use(cookieParser());

  // Credentials are only shared with explicitly listed origins
  const origins = config.http.corsOrigins;
  if (origins.includes('*')) {
    app.enableCors({ origin: '*' });
  } else {
    app.enableCors({ origin: [...origins], credentials: true });
  }

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
    }),
  );
}
