import type { Category, TransactionRow } from '@txnflow/shared';
import { OracleClient } from '../src/oracle/client.js';
import type { OracleRequest, OracleRetryOptions, OracleTransport } from '../src/oracle/types.js';
import { BatchPipeline } from '../src/pipeline/runner.js';
import type { PipelineSettings } from '../src/pipeline/types.js';
import { InMemoryClassificationCache } from '../src/store/memory-cache.js';
import { InMemoryTransactionStore } from '../src/store/memory-transaction-store.js';
import { InMemoryVendorRepository } from '../src/store/memory-vendor-repository.js';
import { VendorRegistry } from '../src/vendor/registry.js';

export const FIXED_NOW = new Date('2024-02-01T10:00:00.000Z');
export const now = (): Date => FIXED_NOW;

export type Script = (request: OracleRequest, signal: AbortSignal) => unknown;

/**
 * In-process oracle backend driven by a function. Records every request.
 */
export class ScriptedTransport implements OracleTransport {
    readonly requests: OracleRequest[] = [];

    constructor(private readonly script: Script) {}

    async send(request: OracleRequest, signal: AbortSignal): Promise<unknown> {
        this.requests.push(request);
        return this.script(request, signal);
    }
}

/**
 * Answers by lower-cased description; anything unknown is not_categorized at 0.3.
 */
export function byDescription(answers: Record<string, { category: Category; confidence: number }>): Script {
    return (request) => {
        const answer = answers[request.descriptionText.trim().toLowerCase()];
        return answer
            ? { ...answer, rationale: `looks like ${answer.category}` }
            : { category: 'not_categorized', confidence: 0.3, rationale: 'unclear' };
    };
}

/**
 * Plays the steps in order: a thrown Error, or a value to return. The last
 * step repeats.
 */
export function sequence(...steps: unknown[]): Script {
    let call = 0;
    return () => {
        const step = steps[Math.min(call, steps.length - 1)];
        call++;
        if (step instanceof Error) throw step;
        return step;
    };
}

/** Never settles until the signal aborts. */
export const hang: Script = (_request, signal) =>
    new Promise((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    });

export const FAST_RETRY: OracleRetryOptions = {
    maxAttempts: 3,
    timeoutMs: 1_000,
    backoff: { minTimeoutMs: 0, maxTimeoutMs: 0, factor: 1 },
};

export const SETTINGS: PipelineSettings = {
    maxConcurrency: 4,
    reviewConfidenceThreshold: 0.6,
    oracleFailureLimit: 5,
    vendorCategories: ['vendor_payment', 'customer_payment_received'],
};

export function row(description: string, overrides: Partial<TransactionRow> = {}): TransactionRow {
    return {
        date: '2024-01-05',
        amount: '1200.00',
        currency: 'DKK',
        description,
        account: 'acc1',
        ...overrides,
    };
}

export function createHarness(
    script: Script,
    options: { settings?: Partial<PipelineSettings>; retry?: Partial<OracleRetryOptions> } = {}
) {
    const transport = new ScriptedTransport(script);
    const store = new InMemoryTransactionStore();
    const cache = new InMemoryClassificationCache();
    const vendors = new InMemoryVendorRepository();
    const registry = new VendorRegistry(vendors, { acceptThreshold: 0.85, reviewThreshold: 0.6, now });
    const oracle = new OracleClient(transport, { ...FAST_RETRY, ...options.retry });
    const pipeline = new BatchPipeline(
        { store, cache, registry, oracle, now },
        { ...SETTINGS, ...options.settings }
    );
    return { transport, store, cache, vendors, registry, oracle, pipeline };
}
