import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger as PinoLogger } from 'nestjs-pino';
import { AppModule } from './app.module';

const DEFAULT_PORT = 3000;

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Use pino logger for all NestJS logs
  app.useLogger(app.get(PinoLogger));

  const logger = new Logger('Bootstrap');

  // Lets an in-flight relay batch finish on SIGTERM
  app.enableShutdownHooks();

  const port = process.env.PORT || DEFAULT_PORT;
  await app.listen(port);

  logger.log(`Audio relay listening on port ${port}`);
}

bootstrap().catch(error => {
  console.error('Failed to start audio relay', error);
  process.exit(1);
});
