import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import {
  ConventionTableParser,
  EdiConvention,
  EdiExtractionResult,
  EdiSegment,
  SegmentMap,
  SourceDocument,
} from '../interfaces/edi.interfaces';
import { ExtractionTimeoutError, NoSegmentsFoundError } from '../errors/edi.errors';
import { PdfService } from '../../pdf/pdf.service';
import { DEFAULT_DETECTION_PAGES, FormatDetectorService } from './format-detector.service';
import { FaureciaTableParserService } from './faurecia-table-parser.service';
import { Vda4932TableParserService } from './vda4932-table-parser.service';
import { SegmentEnricherService } from './segment-enricher.service';
import { StatisticsService } from './statistics.service';
import { createParserContext } from './segment-tree';

/** Segments triés par mnémonique; l'ordre des éléments reste celui du document */
export function sortSegments(segments: SegmentMap): EdiSegment[] {
  return [...segments.values()].sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0));
}

export function requireSegments(result: EdiExtractionResult): EdiExtractionResult {
  if (result.segments.length === 0) {
    throw new NoSegmentsFoundError(result.source);
  }
  return result;
}

/**
 * Pipeline complet: détection du format → parser de la convention
 * (page par page, table par table) → enrichissement → statistiques.
 * Aucun état n'est conservé entre deux documents.
 */
@Injectable()
export class EdiExtractorService {
  private readonly logger = new Logger(EdiExtractorService.name);
  private readonly parsers: ReadonlyMap<EdiConvention, ConventionTableParser>;
  private readonly detectionPageLimit: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly formatDetector: FormatDetectorService,
    faureciaParser: FaureciaTableParserService,
    vdaParser: Vda4932TableParserService,
    private readonly enricher: SegmentEnricherService,
    private readonly statistics: StatisticsService,
    private readonly pdfService: PdfService,
    private readonly configService: ConfigService,
  ) {
    this.parsers = new Map<EdiConvention, ConventionTableParser>([
      [faureciaParser.convention, faureciaParser],
      [vdaParser.convention, vdaParser],
    ]);
    this.detectionPageLimit =
      this.configService.get<number>('edi.detectionPageLimit') || DEFAULT_DETECTION_PAGES;
    this.timeoutMs = this.configService.get<number>('edi.extractionTimeoutMs') || 0;
  }

  extract(source: SourceDocument, sourceName = 'document'): EdiExtractionResult {
    const { convention } = this.formatDetector.detectDocument(source, this.detectionPageLimit);
    const parser = this.parserFor(convention);

    const context = createParserContext();
    const pageCount = source.getPageCount();
    for (let index = 0; index < pageCount; index++) {
      const page = {
        text: source.getPageText(index) || '',
        tables: source.getPageTables(index),
      };
      parser.parsePage(page, index + 1, context);
    }

    this.logger.log(`${sourceName}: ${context.segments.size} segments trouvés (${convention})`);

    this.enricher.enrich(context.segments);

    const segments = sortSegments(context.segments);
    const statistics = this.statistics.compute(segments);
    this.logger.log(`Statistiques ${sourceName}\n${this.statistics.format(statistics)}`);

    return { source: sourceName, convention, segments, statistics };
  }

  async extractFile(filePath: string): Promise<EdiExtractionResult> {
    const name = path.basename(filePath);
    const source = await this.withDeadline(this.pdfService.loadFile(filePath), name);
    return this.extract(source, name);
  }

  async extractBuffer(buffer: Buffer, filename: string): Promise<EdiExtractionResult> {
    const source = await this.withDeadline(this.pdfService.loadBuffer(buffer, filename), filename);
    return this.extract(source, filename);
  }

  private parserFor(convention: EdiConvention): ConventionTableParser {
    const parser = this.parsers.get(convention);
    if (!parser) {
      throw new Error(`Aucun parser pour la convention ${convention}`);
    }
    return parser;
  }

  /**
   * Le parsing est synchrone: seule la lecture du PDF est soumise au délai
   */
  private async withDeadline<T>(work: Promise<T>, name: string): Promise<T> {
    if (this.timeoutMs <= 0) return work;

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ExtractionTimeoutError(name, this.timeoutMs)), this.timeoutMs);
    });

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }
}
