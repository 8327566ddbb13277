import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { appConfig } from './config/app.config';
import { scrapeOnce } from './scrape-once';

const logger = new Logger('Bootstrap');

/**
 * `--once`: scrape every tracked product, save, and exit
 */
async function runOnce(): Promise<void> {
  await scrapeOnce(await NestFactory.createApplicationContext(AppModule));
}

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  // Dashboard frontend runs on its own origin
  app.enableCors({
    origin: appConfig.frontendUrl,
    methods: 'GET,POST,PUT,DELETE,OPTIONS',
    allowedHeaders: 'Content-Type, Authorization',
    credentials: true,
  });

  await app.listen(appConfig.port, '0.0.0.0');
  logger.log(`Price tracker API running on: http://localhost:${appConfig.port}`);
  logger.log(`CORS enabled for: ${appConfig.frontendUrl}`);
  logger.log('Scheduled scraping: daily at 10:00');
}

const entrypoint = process.argv.includes('--once') ? runOnce : bootstrap;

entrypoint().catch((error: unknown) => {
  logger.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
  process.exitCode = 1;
});
