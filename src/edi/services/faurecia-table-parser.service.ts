import { Injectable, Logger } from '@nestjs/common';
import {
  ConventionTableParser,
  ParserContext,
  RawTable,
  SourcePage,
} from '../interfaces/edi.interfaces';
import { FAURECIA_MIN_TABLE_ROWS } from '../config/edi.config';
import { collapseWhitespace, normalizeDescription } from './description-normalizer';
import {
  ELEMENT_CODE,
  GROUP_CODE,
  appendEntry,
  cleanRow,
  column,
  openSegment,
} from './segment-tree';
import { UsageContinuationRule, consolidateUsage } from './usage-consolidator';

const SEGMENT_HEADER = /Segment:\s*([A-Z]{3})/;
// "Segment: NAD Pos.: 0100 Level: 1 Name and address" → "Name and address"
const SEGMENT_HEADER_DESCRIPTION = /Pos\.:\s*\d+.*?([A-Z][\p{L}\p{N}_\s/]+)$/u;

// Colonnes: code | description | . | . | format | . | valeur | usage
const COL_CODE = 0;
const COL_DESCRIPTION = 1;
const COL_FORMAT = 4;
const COL_VALUE = 6;
const COL_USAGE = 7;

export const FAURECIA_USAGE_RULE: UsageContinuationRule = {
  minColumns: 8,
  usageColumn: COL_USAGE,
  startsNewEntry: (cells) => {
    const code = column(cells, COL_CODE);
    return ELEMENT_CODE.test(code) || GROUP_CODE.test(code);
  },
  isContinuation: (usage) => /^['"]?[A-Z0-9]+['"]?\s*=/.test(usage),
};

/**
 * Tables linéaires: l'en-tête "Segment: XXX" est une ligne de la table,
 * les colonnes sont positionnelles.
 */
@Injectable()
export class FaureciaTableParserService implements ConventionTableParser {
  private readonly logger = new Logger(FaureciaTableParserService.name);
  readonly convention = 'faurecia' as const;

  parsePage(page: SourcePage, pageNumber: number, context: ParserContext): void {
    for (const table of page.tables) {
      const added = this.parseTable(table, context);
      if (added > 0) {
        this.logger.debug(`Page ${pageNumber}: ${added} entrées (${table.length} lignes)`);
      }
    }
  }

  /**
   * Le segment et le groupe courants repartent de zéro à chaque table:
   * les lignes avant le premier en-tête de segment sont ignorées.
   */
  parseTable(table: RawTable, context: ParserContext): number {
    if (table.length < FAURECIA_MIN_TABLE_ROWS) return 0;

    context.currentSegment = null;
    context.currentGroup = null;

    let added = 0;
    let index = 0;

    while (index < table.length) {
      const row = table[index];
      if (!row || row.length === 0) {
        index++;
        continue;
      }

      const cells = cleanRow(row);
      const rowText = cells.join(' ');

      const header = SEGMENT_HEADER.exec(rowText);
      if (header) {
        openSegment(context, header[1], this.headerDescription(rowText));
        index++;
        continue;
      }

      if (!context.currentSegment) {
        index++;
        continue;
      }

      const usage = consolidateUsage(table, index, FAURECIA_USAGE_RULE);
      const entry = appendEntry(context, {
        code: column(cells, COL_CODE),
        description: normalizeDescription(column(cells, COL_DESCRIPTION)),
        format: collapseWhitespace(column(cells, COL_FORMAT)),
        value: column(cells, COL_VALUE),
        usage: usage.text,
      });
      if (entry) added++;

      index = usage.nextIndex;
    }

    return added;
  }

  private headerDescription(rowText: string): string {
    const match = SEGMENT_HEADER_DESCRIPTION.exec(rowText);
    return match ? normalizeDescription(match[1]) : '';
  }
}
