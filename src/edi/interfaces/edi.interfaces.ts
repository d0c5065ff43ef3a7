/**
 * Modèle hiérarchique d'une grammaire de message EDI
 * Segment → (élément | groupe composite → éléments)
 */

// ============================================================================
// CONVENTIONS - Conventions de publication supportées
// ============================================================================

export type EdiConvention =
  | 'faurecia'   // Tables linéaires "Segment: Pos.: N Level: N"
  | 'vda4932';   // Sections "Segment: NAD Cons. No.: 14 Level: 1"

// ============================================================================
// TREE - Segments, groupes et éléments
// ============================================================================

/**
 * Élément de données simple (champ), code à 4 chiffres
 */
export interface EdiElement {
  kind: 'element';
  code: string;
  description: string;
  format: string;
  value: string;
  usage: string;     // lignes consolidées, séparées par '\n'
}

/**
 * Groupe composite (C082, S001...), ne contient que des éléments
 */
export interface EdiGroup {
  kind: 'group';
  code: string;
  description: string;
  elements: EdiElement[];
}

export type SegmentEntry = EdiElement | EdiGroup;

export interface EdiSegment {
  code: string;          // mnémonique à 3 lettres (NAD, LIN...)
  description: string;
  elements: SegmentEntry[];
}

/** Segments indexés par mnémonique, dans l'ordre de création */
export type SegmentMap = Map<string, EdiSegment>;

// ============================================================================
// SOURCE - Données matérialisées d'un document PDF
// ============================================================================

/** Cellule telle que fournie par l'extraction (peut être absente) */
export type RawCell = string | null | undefined;
export type RawRow = RawCell[];
export type RawTable = RawRow[];

export interface SourcePage {
  text: string;
  tables: RawTable[];
}

/**
 * Document source: texte et grilles par page (index 0-based)
 */
export interface SourceDocument {
  getPageCount(): number;
  getPageText(index: number): string;
  getPageTables(index: number): RawTable[];
}

// ============================================================================
// PARSING - Contexte partagé entre tables et pages
// ============================================================================

export interface ParserContext {
  segments: SegmentMap;
  currentSegment: string | null;
  currentGroup: EdiGroup | null;
}

export interface ConventionTableParser {
  readonly convention: EdiConvention;
  parsePage(page: SourcePage, pageNumber: number, context: ParserContext): void;
}

// ============================================================================
// RESULT - Statistiques et résultat d'extraction
// ============================================================================

export interface ExtractionStatistics {
  segments: number;
  totalElements: number;      // entrées de premier niveau (éléments + groupes)
  simpleElements: number;
  groups: number;
  elementsInGroups: number;
  totalFields: number;        // simples + imbriqués
  elementsWithFormat: number;
  elementsWithValue: number;
  elementsWithUsage: number;
}

export interface EdiExtractionResult {
  source: string;
  convention: EdiConvention;
  segments: EdiSegment[];     // triés par mnémonique
  statistics: ExtractionStatistics;
}

// ============================================================================
// BATCH - Traitement en masse
// ============================================================================

export type BatchStatus = 'SUCCESS' | 'EMPTY' | 'FAILED';

export interface BatchFileResult {
  file: string;
  status: BatchStatus;
  durationMs: number;
  outputPath?: string;
  convention?: EdiConvention;
  statistics?: ExtractionStatistics;
  error?: string;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  empty: number;       // aucun segment: signalé, pas de fichier écrit
  failed: number;
  totalDurationMs: number;
  averageDurationMs: number;
  results: BatchFileResult[];
}

export interface EdiConfig {
  detectionPageLimit: number;
  extractionTimeoutMs: number;
}
