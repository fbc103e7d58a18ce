export { KeywordRegistry, normalizeKeyword, prepareKeywords } from './keyword-registry.js';
export type { KeywordRegistryOptions } from './keyword-registry.js';
export { InMemoryKeywordStore } from './store.js';
export type { KeywordStore } from './store.js';
export { FileKeywordStore } from './file-store.js';
