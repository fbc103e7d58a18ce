/**
 * Keyword persistence boundary.
 * The registry owns ordering and normalization; a store only keeps the list.
 */

/* eslint-disable @typescript-eslint/require-await */

export interface KeywordStore {
  /** Stored keywords, or null when nothing has been stored yet */
  load(): Promise<string[] | null>;
  save(keywords: readonly string[]): Promise<void>;
}

/**
 * In-memory store for development and testing.
 */
export class InMemoryKeywordStore implements KeywordStore {
  private keywords: string[] | null;
  saveCount = 0;

  constructor(initial?: readonly string[]) {
    this.keywords = initial === undefined ? null : [...initial];
  }

  async load(): Promise<string[] | null> {
    return this.keywords === null ? null : [...this.keywords];
  }

  async save(keywords: readonly string[]): Promise<void> {
    this.keywords = [...keywords];
    this.saveCount += 1;
  }
}
