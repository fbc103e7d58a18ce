export { segmentLines, isTransactionHead, isBoilerplate } from './line-segmenter.js';
export type { SegmentOptions, SegmentResult } from './line-segmenter.js';
export { extractFields, rawLineOf } from './field-extractor.js';
