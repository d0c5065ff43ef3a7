import {
  BadRequestException,
  Body,
  Controller,
  Logger,
  Post,
  RequestTimeoutException,
  UnprocessableEntityException,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { RunBatchDto } from '../common/dto';
import {
  ExtractionTimeoutError,
  NoSegmentsFoundError,
  SourceUnreadableError,
} from './errors/edi.errors';
import { BatchSummary, EdiConvention, ExtractionStatistics } from './interfaces/edi.interfaces';
import { EdiExtractorService, requireSegments } from './services/edi-extractor.service';
import { ExportSegment, toExportJson } from './services/edi-export.service';
import { BatchExtractionService } from './services/batch-extraction.service';

export interface ExtractResponse {
  filename: string;
  convention: EdiConvention;
  statistics: ExtractionStatistics;
  segments: ExportSegment[];
}

@Controller('edi')
export class EdiController {
  private readonly logger = new Logger(EdiController.name);

  constructor(
    private readonly extractor: EdiExtractorService,
    private readonly batch: BatchExtractionService,
  ) {}

  @Post('extract')
  @UseInterceptors(FileInterceptor('file'))
  async extract(@UploadedFile() file?: Express.Multer.File): Promise<ExtractResponse> {
    if (!file) {
      throw new BadRequestException('Fichier requis');
    }

    this.logger.log(`Extraction: ${file.originalname} (${file.size} octets)`);

    try {
      const result = requireSegments(await this.extractor.extractBuffer(file.buffer, file.originalname));
      return {
        filename: file.originalname,
        convention: result.convention,
        statistics: result.statistics,
        segments: toExportJson(result.segments),
      };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Post('batch')
  async runBatch(@Body() dto: RunBatchDto): Promise<BatchSummary> {
    return this.batch.processDirectory({ file: dto.file });
  }
}

export function toHttpException(error: unknown): unknown {
  if (error instanceof SourceUnreadableError) return new BadRequestException(error.message);
  if (error instanceof NoSegmentsFoundError) return new UnprocessableEntityException(error.message);
  if (error instanceof ExtractionTimeoutError) return new RequestTimeoutException(error.message);
  return error;
}
