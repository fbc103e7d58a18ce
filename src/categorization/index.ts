export { matchKeyword, matchDescription } from './keyword-matcher.js';
export type { KeywordMatchResult } from './keyword-matcher.js';
