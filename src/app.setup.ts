import { ValidationPipe } from '@nestjs/common';
import { NestExpressApplication } from '@nestjs/platform-express';
import * as express from 'express';
import { AppConfig } from './config/app.config';

/**
 * Middleware and pipes shared by the server and the HTTP tests. The app
 * must be created with `bodyParser: false` so the JSON limit below is the
 * only one in effect.
 */
export function configureApp(app: NestExpressApplication, config: AppConfig): NestExpressApplication {
  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.enableCors({
    // No configured origins: reflect any origin
    origin: config.corsOrigins.length > 0 ? config.corsOrigins : true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    optionsSuccessStatus: 200,
  });

  app.useGlobalPipes(new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
  }));

  app.enableShutdownHooks();

  return app;
}
