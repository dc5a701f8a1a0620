export { aggregateConfidence } from './aggregate.js';
export type { VendorDecision, VendorSignal, AggregateOptions, AggregatedConfidence } from './aggregate.js';
