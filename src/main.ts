import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { BotService } from './bot/bot.service';
import { initTracer, shutdownTracer } from './shared/tracing/tracer';

// Initialize tracer BEFORE bootstrap
const serviceName = process.env.SERVICE_NAME || 'pdf-summary-bot';
const tracer = initTracer(serviceName);

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });
  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);

  let closing = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (closing) {
      return;
    }
    closing = true;
    logger.log(`Shutting down (${reason})`);
    await app.close();
    await shutdownTracer(tracer);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error(error, 'Shutdown failed');
        process.exitCode = 1;
      });
    });
  }

  // Returns false without polling when TELEGRAM_BOT_TOKEN is missing
  const started = await app.get(BotService).start();
  await shutdown(started ? 'polling stopped' : 'missing bot token');
}

bootstrap().catch((error: unknown) => {
  console.error('❌ Failed to start bot:', error);
  process.exitCode = 1;
});
