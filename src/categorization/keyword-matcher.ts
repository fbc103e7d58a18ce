import type { Keyword } from '../types/output.js';
import { foldText } from '../utils/normalize.js';

export interface KeywordMatchResult {
  keyword: Keyword | null;
  /** Every keyword contained in the description, in registry order */
  candidates: Keyword[];
}

/**
 * Match a description against normalized keywords.
 *
 * Containment is tested on the folded description. When one matching keyword is
 * contained in another matching keyword ("uber" inside "uber eats") the shorter one
 * is dropped; among the rest, registry order decides.
 */
export function matchDescription(description: string, keywords: readonly Keyword[]): KeywordMatchResult {
  const haystack = foldText(description);
  const candidates = keywords.filter((keyword) => keyword !== '' && haystack.includes(keyword));

  const specific = candidates.filter(
    (keyword) => !candidates.some((other) => other !== keyword && other.includes(keyword))
  );

  return {
    keyword: specific[0] ?? null,
    candidates,
  };
}

export function matchKeyword(description: string, keywords: readonly Keyword[]): Keyword | null {
  return matchDescription(description, keywords).keyword;
}
