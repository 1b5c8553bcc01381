import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ShutdownSignal } from '@app/shared/lifecycle/shutdown.signal';
import { describeError } from '@app/shared/errors/feedback.errors';
import { AppModule } from './app.module';
import { resolveLogLevels } from './common/log-levels';

const SHUTDOWN_TIMEOUT_MS = 10000;

async function bootstrap() {
  const logger = new Logger('FeedbackBot');

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });

  logger.log('Feedback bot started');

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.log('Shutting down...');

    // Cut the pending long-poll short before the context starts closing
    app.get(ShutdownSignal).abort();

    const closePromise = app.close();
    const timeoutPromise = new Promise<never>((_, reject) =>
      setTimeout(() => reject(new Error('Shutdown timeout')), SHUTDOWN_TIMEOUT_MS),
    );
    try {
      await Promise.race([closePromise, timeoutPromise]);
      process.exit(0);
    } catch (err) {
      logger.error(`Shutdown error: ${describeError(err)}`);
      process.exit(1);
    }
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

bootstrap().catch((err: unknown) => {
  new Logger('FeedbackBot').error(`Startup failed: ${describeError(err)}`);
  process.exit(1);
});
