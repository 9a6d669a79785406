import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ExpressAdapter, NestExpressApplication } from '@nestjs/platform-express';
import express from 'express';
import { AppModule } from './app.module';
import { environment } from './config/environment';
import { WinstonLogger, log } from './common/logger';

async function bootstrap(): Promise<void> {
  log.info('====================================');
  log.info('CUTSHIFT SERVICE STARTING');
  log.info('Process ID:', process.pid);
  log.info('Environment:', process.env.NODE_ENV || 'development');
  log.info('Media extent policy:', environment.resolve.mediaExtent);
  log.info('====================================');

  // Create an express instance explicitly
  const expressApp = express();

  const app = await NestFactory.create<NestExpressApplication>(
    AppModule,
    new ExpressAdapter(expressApp),
    { bufferLogs: true },
  );
  app.useLogger(new WinstonLogger());

  app.enableCors({
    origin: true,
    methods: environment.cors.methods,
    allowedHeaders: environment.cors.allowedHeaders,
    exposedHeaders: environment.cors.exposedHeaders,
  });

  app.setGlobalPrefix(environment.apiPrefix);

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: false,
    }),
  );

  await app.listen(environment.port);
  log.info('=== APPLICATION STARTED ===');
  log.info(`Server running on port ${environment.port}`);
  log.info(`API endpoint: http://localhost:${environment.port}/${environment.apiPrefix}`);
}

bootstrap().catch((error: unknown) => {
  log.error('=== BOOTSTRAP ERROR ===');
  log.error('Error during application startup:', error);
  process.exitCode = 1;
});
