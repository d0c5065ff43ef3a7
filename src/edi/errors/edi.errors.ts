import { types } from 'util';

/**
 * Erreurs d'extraction au niveau document.
 * Les lignes non reconnues ne sont jamais des erreurs: elles sont ignorées.
 */
export class EdiExtractionError extends Error {
  constructor(
    message: string,
    readonly source: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Le document ne peut pas être ouvert ou lu par l'adaptateur PDF */
export class SourceUnreadableError extends EdiExtractionError {
  constructor(source: string, readonly reason?: unknown) {
    super(`Document illisible: ${source} (${describeCause(reason)})`, source);
  }
}

/** L'extraction n'a produit aucun segment */
export class NoSegmentsFoundError extends EdiExtractionError {
  constructor(source: string) {
    super(`Aucun segment trouvé dans ${source}`, source);
  }
}

export class ExtractionTimeoutError extends EdiExtractionError {
  constructor(source: string, readonly timeoutMs: number) {
    super(`Extraction de ${source} interrompue après ${timeoutMs}ms`, source);
  }
}

/**
 * Message d'une cause quelconque. Les erreurs fs levées sous un autre
 * contexte (vm, jest) ne passent pas `instanceof Error`.
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error || types.isNativeError(cause)) return cause.message;
  if (cause === undefined) return 'cause inconnue';
  return String(cause);
}
