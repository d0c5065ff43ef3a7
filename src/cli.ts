#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { BatchExtractionService } from './edi/services/batch-extraction.service';
import { describeCause } from './edi/errors/edi.errors';

/**
 * Usage: edi-extract [fichier.pdf]
 * Sans argument, traite tous les PDF du dossier schema.
 */
async function run(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });

  try {
    const file = process.argv[2];
    const summary = await app.get(BatchExtractionService).processDirectory({ file });
    process.exitCode = summary.failed > 0 ? 1 : 0;
  } finally {
    await app.close();
  }
}

run().catch((error: unknown) => {
  new Logger('Cli').error(describeCause(error));
  process.exit(1);
});
