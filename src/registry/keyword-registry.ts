/**
 * Keyword registry: the ordered, persisted set of search keywords.
 *
 * Mutations run one at a time through a promise chain and replace the in-memory list
 * only after the store accepted it, so `list()` and `snapshot()` always return a
 * complete list. Extraction runs take one `snapshot()` when they start.
 */

import { DuplicateKeywordError, InvalidKeywordError, KeywordNotFoundError } from '../errors.js';
import type { Keyword } from '../types/output.js';
import { DEFAULT_KEYWORDS } from '../utils/constants.js';
import { foldText } from '../utils/normalize.js';
import type { KeywordStore } from './store.js';

export function normalizeKeyword(text: string): Keyword {
  const keyword = foldText(text);
  if (keyword === '') {
    throw new InvalidKeywordError(text);
  }
  return keyword;
}

/**
 * Normalize and de-duplicate a keyword list, keeping first occurrences and
 * dropping entries that fold to nothing.
 */
export function prepareKeywords(texts: readonly string[]): Keyword[] {
  const seen = new Set<Keyword>();
  for (const text of texts) {
    const keyword = foldText(text);
    if (keyword !== '') {
      seen.add(keyword);
    }
  }
  return [...seen];
}

export interface KeywordRegistryOptions {
  /** Keywords used while the store holds nothing */
  defaults?: readonly string[];
}

export class KeywordRegistry {
  private keywords: readonly Keyword[] = [];
  private loading: Promise<void> | null = null;
  private tail: Promise<void> = Promise.resolve();
  private readonly store: KeywordStore;
  private readonly defaults: readonly string[];

  constructor(store: KeywordStore, options: KeywordRegistryOptions = {}) {
    this.store = store;
    this.defaults = options.defaults ?? DEFAULT_KEYWORDS;
  }

  async list(): Promise<Keyword[]> {
    await this.ensureLoaded();
    return [...this.keywords];
  }

  async snapshot(): Promise<readonly Keyword[]> {
    await this.ensureLoaded();
    return Object.freeze([...this.keywords]);
  }

  async add(text: string): Promise<Keyword> {
    const keyword = normalizeKeyword(text);
    return this.exclusive(async () => {
      await this.ensureLoaded();
      if (this.keywords.includes(keyword)) {
        throw new DuplicateKeywordError(keyword);
      }
      const next = [...this.keywords, keyword];
      await this.store.save(next);
      this.keywords = next;
      return keyword;
    });
  }

  async remove(text: string): Promise<void> {
    const keyword = normalizeKeyword(text);
    return this.exclusive(async () => {
      await this.ensureLoaded();
      if (!this.keywords.includes(keyword)) {
        throw new KeywordNotFoundError(keyword);
      }
      const next = this.keywords.filter((existing) => existing !== keyword);
      await this.store.save(next);
      this.keywords = next;
    });
  }

  private ensureLoaded(): Promise<void> {
    if (this.loading === null) {
      this.loading = this.store.load().then((stored) => {
        this.keywords = prepareKeywords(stored ?? this.defaults);
      });
      // A failed load is retried by the next caller.
      void this.loading.catch(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
