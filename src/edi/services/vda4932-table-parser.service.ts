import { Injectable, Logger } from '@nestjs/common';
import {
  ConventionTableParser,
  ParserContext,
  RawTable,
  SourcePage,
} from '../interfaces/edi.interfaces';
import { VDA_MIN_TABLE_ROWS } from '../config/edi.config';
import { normalizeDescription } from './description-normalizer';
import {
  appendEntry,
  cleanRow,
  column,
  ensureSegment,
  lastCreatedSegment,
} from './segment-tree';
import { UsageContinuationRule, consolidateUsage } from './usage-consolidator';

const SEGMENT_HEADER = /Segment:\s+([A-Z]{3})\s+Cons\.\s*No\.:\s*(\d+)\s+Level:\s*(\d+)\s+(.*)/g;
// "3035 Party qualifier", "C082 Party identification details"
const CODE_AND_DESCRIPTION = /^([SC]?\d{3,4})\s+(.+)$/;
const NEW_ENTRY_PREFIX = /^(\d{4}|[SC]\d{3})(\s|$)/;
const NO_USAGE = '--';

// Colonnes: "code description" | format | exemple | usage
const COL_CODE_DESCRIPTION = 0;
const COL_FORMAT = 1;
const COL_VALUE = 2;
const COL_USAGE = 3;

export const VDA_USAGE_RULE: UsageContinuationRule = {
  minColumns: 4,
  usageColumn: COL_USAGE,
  startsNewEntry: (cells) => NEW_ENTRY_PREFIX.test(column(cells, COL_CODE_DESCRIPTION)),
  isContinuation: (usage) =>
    /^['"]?[A-Z0-9]+['"]?\s*=/.test(usage) || /^[A-Z][a-z]+\s+[A-Z]/.test(usage),
};

export interface VdaSegmentHeader {
  code: string;
  consNo: number;
  level: number;
  description: string;
}

/**
 * Tables VDA 4932: les segments sont déclarés dans le texte de la page,
 * les tables ne portent que les éléments et les groupes.
 */
@Injectable()
export class Vda4932TableParserService implements ConventionTableParser {
  private readonly logger = new Logger(Vda4932TableParserService.name);
  readonly convention = 'vda4932' as const;

  parsePage(page: SourcePage, pageNumber: number, context: ParserContext): void {
    // Page sans texte: ni en-tête ni table exploitable
    if (!page.text) return;

    for (const header of this.findSegmentHeaders(page.text)) {
      ensureSegment(context.segments, header.code, header.description);
    }

    for (const table of page.tables) {
      const added = this.parseTable(table, context);
      if (added > 0) {
        this.logger.debug(`Page ${pageNumber}: ${added} entrées pour ${context.currentSegment}`);
      }
    }
  }

  findSegmentHeaders(text: string): VdaSegmentHeader[] {
    return Array.from(text.matchAll(SEGMENT_HEADER), (match) => ({
      code: match[1],
      consNo: parseInt(match[2], 10),
      level: parseInt(match[3], 10),
      description: normalizeDescription(match[4]),
    }));
  }

  /**
   * Une table appartient au dernier segment créé dans le document,
   * même si sa déclaration se trouve sur une page précédente.
   */
  parseTable(table: RawTable, context: ParserContext): number {
    if (table.length < VDA_MIN_TABLE_ROWS) return 0;

    const owner = lastCreatedSegment(context.segments);
    if (!owner) return 0;

    context.currentSegment = owner;
    context.currentGroup = null;

    let added = 0;
    let index = 0;

    while (index < table.length) {
      const row = table[index];
      if (!row || row.length < 2) {
        index++;
        continue;
      }

      const cells = cleanRow(row);
      const codeAndDescription = column(cells, COL_CODE_DESCRIPTION);
      if (this.isHeaderNoise(codeAndDescription)) {
        index++;
        continue;
      }

      const match = CODE_AND_DESCRIPTION.exec(codeAndDescription);
      if (!match) {
        index++;
        continue;
      }

      const primaryUsage = column(cells, COL_USAGE);
      const usage = consolidateUsage(
        table,
        index,
        VDA_USAGE_RULE,
        primaryUsage === NO_USAGE ? '' : primaryUsage,
      );

      const entry = appendEntry(context, {
        code: match[1],
        description: normalizeDescription(match[2].trim()),
        format: column(cells, COL_FORMAT),
        value: column(cells, COL_VALUE),
        usage: usage.text,
      });
      if (entry) added++;

      index = usage.nextIndex;
    }

    return added;
  }

  private isHeaderNoise(codeAndDescription: string): boolean {
    return (
      !codeAndDescription ||
      codeAndDescription.startsWith('S.Format') ||
      codeAndDescription.includes('Segment can/must')
    );
  }
}
