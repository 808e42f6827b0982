import 'reflect-metadata';
import * as dotenv from 'dotenv';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { loadAppConfig } from './config/app.config';

async function bootstrap(): Promise<void> {
  dotenv.config();
  const config = loadAppConfig();

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: config.logLevels,
  });
  // CSV imports arrive as JSON strings
  app.useBodyParser('json', { limit: config.importMaxBytes });
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  await app.listen(config.port);
  Logger.log(`Listening on port ${config.port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(error instanceof Error ? error.stack ?? error.message : String(error), 'Bootstrap');
  process.exit(1);
});
