import { Injectable } from '@nestjs/common';
import { EdiElement, EdiSegment, ExtractionStatistics } from '../interfaces/edi.interfaces';

export function computeStatistics(segments: Iterable<EdiSegment>): ExtractionStatistics {
  const stats: ExtractionStatistics = {
    segments: 0,
    totalElements: 0,
    simpleElements: 0,
    groups: 0,
    elementsInGroups: 0,
    totalFields: 0,
    elementsWithFormat: 0,
    elementsWithValue: 0,
    elementsWithUsage: 0,
  };

  const countField = (element: EdiElement) => {
    stats.totalFields++;
    if (element.format) stats.elementsWithFormat++;
    if (element.value) stats.elementsWithValue++;
    if (element.usage) stats.elementsWithUsage++;
  };

  for (const segment of segments) {
    stats.segments++;
    for (const entry of segment.elements) {
      stats.totalElements++;
      if (entry.kind === 'element') {
        stats.simpleElements++;
        countField(entry);
      } else {
        stats.groups++;
        stats.elementsInGroups += entry.elements.length;
        entry.elements.forEach(countField);
      }
    }
  }

  return stats;
}

@Injectable()
export class StatisticsService {
  compute(segments: Iterable<EdiSegment>): ExtractionStatistics {
    return computeStatistics(segments);
  }

  /**
   * Bloc de statistiques pour les logs
   */
  format(stats: ExtractionStatistics): string {
    return [
      `Segments                : ${stats.segments}`,
      `Éléments simples        : ${stats.simpleElements}`,
      `Groupes composites      : ${stats.groups}`,
      `Éléments dans groupes   : ${stats.elementsInGroups}`,
      `Total éléments          : ${stats.totalFields}`,
      `Éléments avec format    : ${stats.elementsWithFormat}`,
      `Éléments avec valeur    : ${stats.elementsWithValue}`,
      `Éléments avec usage     : ${stats.elementsWithUsage}`,
    ].join('\n');
  }
}
