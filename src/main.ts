import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';

import { AppModule } from './modules/app/app.module';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });

  app.set('trust proxy', true);

  // OnModuleDestroy (SQLite close, breaker timer) must run on SIGTERM/SIGINT
  app.enableShutdownHooks();
  app.useBodyParser('json', { limit: '5mb' });

  const globalPrefix = process.env.API_PREFIX ?? 'api';
  app.setGlobalPrefix(globalPrefix);
  app.useLogger(new Logger('AccessSync'));

  const port = Number(process.env.PORT ?? 3000);
  await app.listen(port);
  Logger.log(`Access sync is running on http://localhost:${port}/${globalPrefix}`);
  Logger.log(`Recent logs: http://localhost:${port}/${globalPrefix}/admin/logs/recent?limit=25`);
}

void bootstrap();
