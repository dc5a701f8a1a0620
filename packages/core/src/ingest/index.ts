export { readTabularRows, recordToRow } from './read-rows.js';
export type { IngestOptions, IngestResult } from './read-rows.js';
