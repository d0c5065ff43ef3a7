import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { EdiElement, EdiSegment, SegmentEntry } from '../interfaces/edi.interfaces';

// ============================================================================
// EXPORT SCHEMA - Forme JSON publiée (champ / groupe)
// ============================================================================

export const ExportElementSchema = z.object({
  champ: z.string(),
  description: z.string(),
  format: z.string(),
  valeur: z.string(),
  usage: z.string(),
});

export const ExportGroupSchema = z.object({
  groupe: z.string(),
  description: z.string(),
  champs: z.array(ExportElementSchema),
});

export const ExportSegmentSchema = z.object({
  segment: z.string(),
  description: z.string(),
  elements: z.array(z.union([ExportElementSchema, ExportGroupSchema])),
});

export const ExportDocumentSchema = z.array(ExportSegmentSchema);

export type ExportElement = z.infer<typeof ExportElementSchema>;
export type ExportGroup = z.infer<typeof ExportGroupSchema>;
export type ExportSegment = z.infer<typeof ExportSegmentSchema>;

function toExportElement(element: EdiElement): ExportElement {
  return {
    champ: element.code,
    description: element.description,
    format: element.format,
    valeur: element.value,
    usage: element.usage,
  };
}

function toExportEntry(entry: SegmentEntry): ExportElement | ExportGroup {
  if (entry.kind === 'element') return toExportElement(entry);
  return {
    groupe: entry.code,
    description: entry.description,
    champs: entry.elements.map(toExportElement),
  };
}

function fromExportElement(element: ExportElement): EdiElement {
  return {
    kind: 'element',
    code: element.champ,
    description: element.description,
    format: element.format,
    value: element.valeur,
    usage: element.usage,
  };
}

export function toExportJson(segments: EdiSegment[]): ExportSegment[] {
  return segments.map((segment) => ({
    segment: segment.code,
    description: segment.description,
    elements: segment.elements.map(toExportEntry),
  }));
}

export function fromExportJson(data: unknown): EdiSegment[] {
  return ExportDocumentSchema.parse(data).map((segment) => ({
    code: segment.segment,
    description: segment.description,
    elements: segment.elements.map((entry): SegmentEntry =>
      'champ' in entry
        ? fromExportElement(entry)
        : {
            kind: 'group',
            code: entry.groupe,
            description: entry.description,
            elements: entry.champs.map(fromExportElement),
          },
    ),
  }));
}

/** JSON indenté sur 4 espaces, caractères non ASCII conservés */
export function serializeSegments(segments: EdiSegment[]): string {
  return JSON.stringify(toExportJson(segments), null, 4);
}

export function parseExportJson(json: string): EdiSegment[] {
  return fromExportJson(JSON.parse(json));
}

/**
 * "schema/DELFOR D96A-Faurecia.pdf" → "<exportDir>/DELFOR_D96A_Faurecia.json"
 */
export function outputPathFor(inputPath: string, exportDir: string): string {
  const name = path.parse(inputPath).name.replace(/ /g, '_').replace(/-/g, '_');
  return path.join(exportDir, `${name}.json`);
}

@Injectable()
export class EdiExportService {
  private readonly logger = new Logger(EdiExportService.name);
  private readonly exportDir: string;

  constructor(private readonly configService: ConfigService) {
    this.exportDir = this.configService.get<string>('app.exportDir') || './export';
  }

  async save(segments: EdiSegment[], inputPath: string): Promise<string> {
    const outputPath = outputPathFor(inputPath, this.exportDir);
    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.promises.writeFile(outputPath, serializeSegments(segments), 'utf-8');

    this.logger.log(`Export sauvegardé: ${outputPath}`);
    return outputPath;
  }

  async load(exportPath: string): Promise<EdiSegment[]> {
    const json = await fs.promises.readFile(exportPath, 'utf-8');
    return parseExportJson(json);
  }
}
