import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const log = new Logger('Bootstrap');

  // Runs WebhookLifecycleService.onApplicationShutdown on SIGTERM/SIGINT
  app.enableShutdownHooks();

  const cfg = app.get(ConfigService);
  const port = cfg.get<number>('PORT') ?? 8000;
  await app.listen(port, '0.0.0.0');
  log.log(`🚀 Relay bot listening on port ${port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    'Fatal error during bootstrap',
    err instanceof Error ? err.stack : String(err),
  );
  process.exitCode = 1;
});
