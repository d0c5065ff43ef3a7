import { Module } from '@nestjs/common';
import { PdfModule } from '../pdf/pdf.module';
import { EdiController } from './edi.controller';
import { FormatDetectorService } from './services/format-detector.service';
import { FaureciaTableParserService } from './services/faurecia-table-parser.service';
import { Vda4932TableParserService } from './services/vda4932-table-parser.service';
import { SegmentEnricherService } from './services/segment-enricher.service';
import { StatisticsService } from './services/statistics.service';
import { EdiExtractorService } from './services/edi-extractor.service';
import { EdiExportService } from './services/edi-export.service';
import { BatchExtractionService } from './services/batch-extraction.service';

/**
 * EDI Module
 *
 * Extraction des grammaires de messages EDI depuis les guides PDF:
 * - Détection de la convention (Faurecia, VDA 4932)
 * - Parsing des tables par convention
 * - Enrichissement des descriptions de segments
 * - Export JSON et traitement en masse
 */
@Module({
  imports: [PdfModule],
  providers: [
    FormatDetectorService,
    FaureciaTableParserService,
    Vda4932TableParserService,
    SegmentEnricherService,
    StatisticsService,
    EdiExtractorService,
    EdiExportService,
    BatchExtractionService,
  ],
  controllers: [EdiController],
  exports: [EdiExtractorService, EdiExportService, BatchExtractionService],
})
export class EdiModule {}
