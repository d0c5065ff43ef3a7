import { registerAs } from '@nestjs/config';
import { EdiConfig } from '../interfaces/edi.interfaces';
import standardSegments from '../data/standard-segments.json';

export const ediConfig = registerAs('edi', (): EdiConfig => ({
  detectionPageLimit: parseInt(process.env.EDI_DETECTION_PAGES || '10', 10),
  extractionTimeoutMs: parseInt(process.env.EDI_EXTRACTION_TIMEOUT_MS || '0', 10),
}));

// Seuils de bruit: en dessous, la table est ignorée
export const FAURECIA_MIN_TABLE_ROWS = 5;
export const VDA_MIN_TABLE_ROWS = 3;

/**
 * Descriptions EDIFACT standard par mnémonique de segment
 */
export const STANDARD_SEGMENT_DESCRIPTIONS: ReadonlyMap<string, string> = new Map(
  Object.entries(standardSegments),
);

/** Descriptions considérées comme absentes */
export const PLACEHOLDER_DESCRIPTIONS: ReadonlySet<string> = new Set(['', '0', '1']);

// ============================================================================
// DETECTION - Marqueurs de convention (ordre de priorité)
// ============================================================================

export const VDA_SEGMENT_MARKER = /Segment:\s+[A-Z]{3}\s+Cons\.\s*No\.:/;
export const FAURECIA_INLINE_MARKER = /Segment:.*Pos\.:\s*\d+.*Level:/;
export const FAURECIA_SPLIT_MARKER = /Segment:\s+Pos\.:\s*\d+\s+Level:/;
export const FAURECIA_POSITION_LABEL = 'Pos.:';
export const FAURECIA_KNOWN_SEGMENTS = /\b(UNH|BGM|DTM|NAD|LIN|MOA)\b/;
