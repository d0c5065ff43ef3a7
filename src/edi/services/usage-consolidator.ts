import { RawRow, RawTable } from '../interfaces/edi.interfaces';
import { cleanRow, column } from './segment-tree';

/**
 * Règle de continuation d'une colonne "usage" propre à une convention
 */
export interface UsageContinuationRule {
  minColumns: number;
  usageColumn: number;
  startsNewEntry(cells: string[]): boolean;
  isContinuation(usage: string): boolean;
}

export interface ConsolidatedUsage {
  text: string;
  nextIndex: number;   // première ligne non consommée
}

/**
 * Regroupe l'usage de la ligne `startIndex` avec les lignes suivantes
 * qui définissent des valeurs codées ('ZZZ' = ..., 1 = ...).
 */
export function consolidateUsage(
  rows: RawTable,
  startIndex: number,
  rule: UsageContinuationRule,
  primaryUsage?: string,
): ConsolidatedUsage {
  const first = primaryUsage ?? usageOf(rows[startIndex], rule);
  if (!first) {
    return { text: '', nextIndex: startIndex + 1 };
  }

  const parts = [first];
  let next = startIndex + 1;

  while (next < rows.length) {
    const row = rows[next];
    if (!row || row.length < rule.minColumns) break;

    const cells = cleanRow(row);
    if (rule.startsNewEntry(cells)) break;

    const usage = column(cells, rule.usageColumn);
    if (!usage || !rule.isContinuation(usage)) break;

    parts.push(usage);
    next++;
  }

  return { text: parts.join('\n'), nextIndex: next };
}

function usageOf(row: RawRow | undefined, rule: UsageContinuationRule): string {
  return row ? column(cleanRow(row), rule.usageColumn) : '';
}
