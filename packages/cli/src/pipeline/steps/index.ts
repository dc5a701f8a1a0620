export { skipPersisted } from './dedup.js';
export { classifyRow } from './classify.js';
export { resolveVendor } from './vendor.js';
export { aggregateRow } from './aggregate.js';
export { persistRow } from './persist.js';
