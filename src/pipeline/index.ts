export { runExtraction, extractStatementFile } from './extract-statement.js';
export type { StatementExtraction, ExtractStatementOptions } from './extract-statement.js';
