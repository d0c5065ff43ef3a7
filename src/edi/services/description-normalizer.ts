// Indicateurs M/C en fin de description ("Party qualifier M an..3")
const STATUS_CODE_SUFFIX = /\s+[MC]\s+[MCN](\s+.*)?$/;
const NOT_USED_SUFFIX = /\s+NOT\s+USED$/;

/**
 * Retire les indicateurs de statut et "NOT USED" en fin de description.
 * Appliqué jusqu'à stabilité: normalize(normalize(s)) === normalize(s).
 */
export function normalizeDescription(text: string | null | undefined): string {
  if (!text) return '';

  let current = text;
  for (;;) {
    const next = current
      .replace(STATUS_CODE_SUFFIX, '')
      .replace(NOT_USED_SUFFIX, '')
      .trim();
    if (next === current) return next;
    current = next;
  }
}

export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter((part) => part.length > 0).join(' ');
}
