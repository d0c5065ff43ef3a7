import { Injectable, Logger } from '@nestjs/common';
import { SegmentMap } from '../interfaces/edi.interfaces';
import { PLACEHOLDER_DESCRIPTIONS, STANDARD_SEGMENT_DESCRIPTIONS } from '../config/edi.config';
import { normalizeDescription } from './description-normalizer';

@Injectable()
export class SegmentEnricherService {
  private readonly logger = new Logger(SegmentEnricherService.name);

  /**
   * Renormalise chaque description et remplace les descriptions vides
   * ou de remplissage par le libellé EDIFACT standard quand il existe.
   * Retourne le nombre de descriptions remplacées.
   */
  enrich(segments: SegmentMap): number {
    let replaced = 0;

    for (const segment of segments.values()) {
      segment.description = normalizeDescription(segment.description);

      if (!PLACEHOLDER_DESCRIPTIONS.has(segment.description)) continue;

      const standard = STANDARD_SEGMENT_DESCRIPTIONS.get(segment.code);
      if (standard) {
        segment.description = standard;
        replaced++;
      }
    }

    this.logger.debug(`${replaced} descriptions standard ajoutées`);
    return replaced;
  }
}
