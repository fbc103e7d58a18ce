const COMBINING_MARKS = /[\u0300-\u036f]/g;

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Case-folded, accent-stripped, whitespace-collapsed form used for every
 * keyword comparison.
 */
export function foldText(text: string): string {
  return collapseWhitespace(text.normalize('NFD').replace(COMBINING_MARKS, '').toLowerCase());
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
