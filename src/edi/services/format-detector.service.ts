import { Injectable, Logger } from '@nestjs/common';
import { EdiConvention, SourceDocument } from '../interfaces/edi.interfaces';
import {
  FAURECIA_INLINE_MARKER,
  FAURECIA_KNOWN_SEGMENTS,
  FAURECIA_POSITION_LABEL,
  FAURECIA_SPLIT_MARKER,
  VDA_SEGMENT_MARKER,
} from '../config/edi.config';

export const DEFAULT_CONVENTION: EdiConvention = 'faurecia';
export const DEFAULT_DETECTION_PAGES = 10;

interface DetectionRule {
  convention: EdiConvention;
  label: string;
  matches(text: string): boolean;
}

// Évaluées dans l'ordre, sur toutes les pages inspectées
const DETECTION_RULES: readonly DetectionRule[] = [
  {
    convention: 'vda4932',
    label: 'Segment: XXX Cons. No.:',
    matches: (text) => VDA_SEGMENT_MARKER.test(text),
  },
  {
    convention: 'faurecia',
    label: 'Segment: ... Pos.: N ... Level:',
    matches: (text) => FAURECIA_INLINE_MARKER.test(text),
  },
  {
    convention: 'faurecia',
    label: 'Segment: Pos.: N Level:',
    matches: (text) => FAURECIA_SPLIT_MARKER.test(text),
  },
  {
    convention: 'faurecia',
    label: 'Pos.: + segment connu',
    matches: (text) => text.includes(FAURECIA_POSITION_LABEL) && FAURECIA_KNOWN_SEGMENTS.test(text),
  },
];

export interface FormatDetection {
  convention: EdiConvention;
  matchedRule?: string;
  pageNumber?: number;
}

@Injectable()
export class FormatDetectorService {
  private readonly logger = new Logger(FormatDetectorService.name);

  /**
   * Ne retourne jamais d'erreur: sans marqueur, la convention par défaut s'applique
   */
  detect(pageTexts: string[]): FormatDetection {
    // Règle par règle, puis page par page: un marqueur fort en page 3
    // l'emporte sur un marqueur plus faible en page 1.
    for (const rule of DETECTION_RULES) {
      const pageIndex = pageTexts.findIndex((text) => rule.matches(text));
      if (pageIndex >= 0) {
        this.logger.log(`Format détecté: ${rule.convention} (${rule.label}, page ${pageIndex + 1})`);
        return { convention: rule.convention, matchedRule: rule.label, pageNumber: pageIndex + 1 };
      }
    }

    this.logger.warn(`Format inconnu, utilisation du format ${DEFAULT_CONVENTION} par défaut`);
    return { convention: DEFAULT_CONVENTION };
  }

  detectDocument(source: SourceDocument, pageLimit = DEFAULT_DETECTION_PAGES): FormatDetection {
    const count = Math.min(source.getPageCount(), pageLimit);
    const texts: string[] = [];
    for (let i = 0; i < count; i++) {
      texts.push(source.getPageText(i) || '');
    }
    return this.detect(texts);
  }
}
