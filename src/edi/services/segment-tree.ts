import {
  EdiElement,
  EdiGroup,
  EdiSegment,
  ParserContext,
  RawCell,
  RawRow,
  SegmentEntry,
  SegmentMap,
} from '../interfaces/edi.interfaces';

export const ELEMENT_CODE = /^\d{4}$/;
export const GROUP_CODE = /^[SC]\d{3}$/;

export type EntryKind = SegmentEntry['kind'];

/**
 * Champs lus sur une ligne de table, avant classification
 */
export interface EntryRow {
  code: string;
  description: string;
  format: string;
  value: string;
  usage: string;
}

export function createParserContext(segments: SegmentMap = new Map()): ParserContext {
  return { segments, currentSegment: null, currentGroup: null };
}

export function cellText(cell: RawCell): string {
  return cell ? String(cell).trim() : '';
}

export function cleanRow(row: RawRow): string[] {
  return row.map(cellText);
}

export function column(cells: string[], index: number): string {
  return cells[index] ?? '';
}

export function classifyCode(code: string): EntryKind | null {
  if (GROUP_CODE.test(code)) return 'group';
  if (ELEMENT_CODE.test(code)) return 'element';
  return null;
}

/**
 * Crée le segment s'il n'existe pas encore. Un segment déjà connu
 * garde sa description et ses éléments.
 */
export function ensureSegment(segments: SegmentMap, code: string, description: string): EdiSegment {
  const existing = segments.get(code);
  if (existing) return existing;

  const segment: EdiSegment = { code, description, elements: [] };
  segments.set(code, segment);
  return segment;
}

/** Ouvre (ou rouvre) un segment: les lignes suivantes lui appartiennent */
export function openSegment(context: ParserContext, code: string, description: string): EdiSegment {
  const segment = ensureSegment(context.segments, code, description);
  context.currentSegment = code;
  context.currentGroup = null;
  return segment;
}

/** Dernier segment créé dans le document (ordre d'insertion) */
export function lastCreatedSegment(segments: SegmentMap): string | null {
  let last: string | null = null;
  for (const code of segments.keys()) {
    last = code;
  }
  return last;
}

/**
 * Rattache une ligne au segment courant: un groupe devient le groupe courant,
 * un élément va dans le groupe courant s'il y en a un, sinon dans le segment.
 * Les codes non reconnus sont ignorés.
 */
export function appendEntry(context: ParserContext, row: EntryRow): SegmentEntry | null {
  const segment = context.currentSegment ? context.segments.get(context.currentSegment) : undefined;
  if (!segment) return null;

  switch (classifyCode(row.code)) {
    case 'group': {
      const group: EdiGroup = {
        kind: 'group',
        code: row.code,
        description: row.description,
        elements: [],
      };
      segment.elements.push(group);
      context.currentGroup = group;
      return group;
    }
    case 'element': {
      const element: EdiElement = {
        kind: 'element',
        code: row.code,
        description: row.description,
        format: row.format,
        value: row.value,
        usage: row.usage,
      };
      const parent = context.currentGroup ?? segment;
      parent.elements.push(element);
      return element;
    }
    default:
      return null;
  }
}
