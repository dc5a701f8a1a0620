export { normalizeRow, fingerprint, fingerprintNormalized, fingerprintPayload } from './fingerprint.js';
export type { NormalizeOptions } from './fingerprint.js';
export { deriveBatchId, canonicalJson } from './batch-id.js';
