import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger, LogLevel } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { loggingConfig } from '@app/shared/config/configuration';
import { AppModule } from './app.module';
import { SocketModeService } from './slack/socket-mode.service';

const SHUTDOWN_TIMEOUT_MS = 10000;

const LOG_LEVELS: Record<string, LogLevel[]> = {
  debug: ['error', 'warn', 'log', 'debug'],
  info: ['error', 'warn', 'log'],
  warn: ['error', 'warn'],
  error: ['error'],
};

async function bootstrap() {
  const logger = new Logger('BotService');

  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  const loggingCfg = app.get<ConfigType<typeof loggingConfig>>(loggingConfig.KEY);
  app.useLogger(LOG_LEVELS[loggingCfg.level] ?? LOG_LEVELS.info);

  logger.log('Bot service started');

  let shuttingDown = false;
  const shutdown = async (exitCode: number) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.log('Shutting down...');
    const closePromise = app.close();
    const timeoutPromise = new Promise<never>((_, reject) =>
      setTimeout(() => reject(new Error('Shutdown timeout')), SHUTDOWN_TIMEOUT_MS),
    );
    try {
      await Promise.race([closePromise, timeoutPromise]);
      process.exit(exitCode);
    } catch (err) {
      logger.error(`Shutdown error: ${(err as Error).message}`);
      process.exit(1);
    }
  };

  // No reconnect: a lost connection ends the process so the supervisor restarts it.
  app.get(SocketModeService).onClosed((error) => {
    if (error) {
      logger.error(`Socket Mode connection closed: ${error.message}`);
      void shutdown(1);
    }
  });

  process.on('SIGINT', () => void shutdown(0));
  process.on('SIGTERM', () => void shutdown(0));
}

bootstrap().catch((err) => {
  new Logger('BotService').error(`Startup failed: ${(err as Error).message}`);
  process.exit(1);
});
