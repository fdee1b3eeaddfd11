export { createDateOutput, parseDate, parseDateInto, recordFromOutput } from './date-parser.js';
export { formatDateRecord } from './formatter.js';
export { isEcmaWhiteSpace } from './input-reader.js';
export { listKeywordEntries, type KeywordEntry } from './keyword-table.js';
export * from '../types/date-record.js';
