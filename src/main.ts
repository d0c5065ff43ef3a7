import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { describeCause } from './edi/errors/edi.errors';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'log', 'debug', 'verbose'],
  });

  // Validation globale des DTOs
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  );

  // Préfixe API
  app.setGlobalPrefix('api');

  const configService = app.get(ConfigService);
  const port = configService.get<number>('app.port') || 3000;

  await app.listen(port);

  logger.log(`Application démarrée sur http://localhost:${port}`);
  logger.log(`Dossier schema: ${configService.get<string>('app.schemaDir')}`);
  logger.log(`Dossier export: ${configService.get<string>('app.exportDir')}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(`Démarrage impossible: ${describeCause(error)}`);
  process.exit(1);
});
