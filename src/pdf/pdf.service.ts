import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { SourceUnreadableError, describeCause } from '../edi/errors/edi.errors';
import { LayoutExtractionConfig, buildSourcePages, extractPdfTokens } from './extract-text';
import { MaterializedSourceDocument } from './source-document';

@Injectable()
export class PdfService {
  private readonly logger = new Logger(PdfService.name);

  async loadFile(filePath: string, config: LayoutExtractionConfig = {}): Promise<MaterializedSourceDocument> {
    const filename = path.basename(filePath);
    let buffer: Buffer;
    try {
      buffer = await fs.promises.readFile(filePath);
    } catch (error) {
      throw new SourceUnreadableError(filename, error);
    }
    return this.loadBuffer(buffer, filename, config);
  }

  /**
   * Texte et tables de chaque page; toute erreur de lecture est fatale pour le document
   */
  async loadBuffer(
    buffer: Buffer,
    filename: string,
    config: LayoutExtractionConfig = {},
  ): Promise<MaterializedSourceDocument> {
    try {
      // pdfjs transfère le buffer au worker: on travaille sur une copie
      const extracted = await extractPdfTokens(new Uint8Array(buffer));
      const { pages, stats } = buildSourcePages(extracted, config);

      this.logger.debug(
        `${filename}: ${stats.totalPages} pages, ${stats.totalTokens} tokens, ${stats.totalRows} lignes ` +
          `(${stats.avgCellsPerRow} cellules/ligne, écart de cellule ${stats.gapThreshold})`,
      );

      return new MaterializedSourceDocument(pages);
    } catch (error) {
      this.logger.error(`Erreur extraction PDF ${filename}: ${describeCause(error)}`);
      throw new SourceUnreadableError(filename, error);
    }
  }
}
