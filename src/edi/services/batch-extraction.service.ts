import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { BatchFileResult, BatchSummary } from '../interfaces/edi.interfaces';
import { NoSegmentsFoundError, describeCause } from '../errors/edi.errors';
import { EdiExtractorService, requireSegments } from './edi-extractor.service';
import { EdiExportService } from './edi-export.service';

export interface BatchOptions {
  file?: string;        // nom d'un seul PDF du dossier schema
}

/**
 * Traitement en masse des PDF du dossier schema: chaque document
 * est isolé, un échec n'interrompt pas le lot.
 */
@Injectable()
export class BatchExtractionService {
  private readonly logger = new Logger(BatchExtractionService.name);
  private readonly schemaDir: string;

  constructor(
    private readonly extractor: EdiExtractorService,
    private readonly exporter: EdiExportService,
    private readonly configService: ConfigService,
  ) {
    this.schemaDir = this.configService.get<string>('app.schemaDir') || './schema';
  }

  async listPdfFiles(directory: string = this.schemaDir): Promise<string[]> {
    if (!fs.existsSync(directory)) {
      this.logger.warn(`Dossier introuvable: ${directory}`);
      return [];
    }

    const entries = await fs.promises.readdir(directory);
    return entries
      .filter((entry) => entry.toLowerCase().endsWith('.pdf'))
      .sort()
      .map((entry) => path.join(directory, entry));
  }

  async processDirectory(options: BatchOptions = {}): Promise<BatchSummary> {
    const directory = this.schemaDir;
    let files = await this.listPdfFiles(directory);

    if (options.file) {
      files = files.filter((file) => path.basename(file) === options.file);
      if (files.length === 0) {
        this.logger.warn(`Fichier introuvable: ${path.join(directory, options.file)}`);
      }
    }

    if (files.length === 0) {
      this.logger.warn(`Aucun PDF trouvé dans ${directory}`);
      return this.summarize([], 0);
    }

    this.logger.log(`Traitement en masse: ${files.length} fichiers PDF`);

    const start = Date.now();
    const results: BatchFileResult[] = [];
    for (const [index, file] of files.entries()) {
      this.logger.log(`[${index + 1}/${files.length}] Traitement de ${path.basename(file)}...`);
      results.push(await this.processFile(file));
    }

    const summary = this.summarize(results, Date.now() - start);
    this.logSummary(summary);
    return summary;
  }

  async processFile(filePath: string): Promise<BatchFileResult> {
    const file = path.basename(filePath);
    const start = Date.now();

    try {
      const result = requireSegments(await this.extractor.extractFile(filePath));
      const outputPath = await this.exporter.save(result.segments, filePath);

      return {
        file,
        status: 'SUCCESS',
        durationMs: Date.now() - start,
        outputPath,
        convention: result.convention,
        statistics: result.statistics,
      };
    } catch (error) {
      if (error instanceof NoSegmentsFoundError) {
        this.logger.warn(`Échec: ${file} ne contient aucun segment`);
        return { file, status: 'EMPTY', durationMs: Date.now() - start, error: error.message };
      }

      this.logger.error(`Erreur ${file}: ${describeCause(error)}`);
      return { file, status: 'FAILED', durationMs: Date.now() - start, error: describeCause(error) };
    }
  }

  summarize(results: BatchFileResult[], totalDurationMs: number): BatchSummary {
    return {
      total: results.length,
      succeeded: results.filter((r) => r.status === 'SUCCESS').length,
      empty: results.filter((r) => r.status === 'EMPTY').length,
      failed: results.filter((r) => r.status === 'FAILED').length,
      totalDurationMs,
      averageDurationMs: results.length > 0 ? Math.round(totalDurationMs / results.length) : 0,
      results,
    };
  }

  private logSummary(summary: BatchSummary): void {
    const lines = [
      `Fichiers traités  : ${summary.total}`,
      `Succès            : ${summary.succeeded}`,
      `Sans segment      : ${summary.empty}`,
      `Échecs            : ${summary.failed}`,
      `Durée totale      : ${(summary.totalDurationMs / 1000).toFixed(2)}s`,
      `Durée moyenne     : ${(summary.averageDurationMs / 1000).toFixed(2)}s/fichier`,
    ];

    const notSucceeded = summary.results.filter((r) => r.status !== 'SUCCESS');
    if (notSucceeded.length > 0) {
      lines.push('Fichiers en échec:');
      for (const r of notSucceeded) {
        lines.push(`  ${r.file}: ${r.error ?? r.status}`);
      }
    }

    lines.push('Fichiers réussis:');
    for (const ok of summary.results.filter((r) => r.status === 'SUCCESS')) {
      lines.push(`  ${ok.file} (${(ok.durationMs / 1000).toFixed(2)}s)`);
    }

    this.logger.log(`Résumé du traitement en masse\n${lines.join('\n')}`);
  }
}
