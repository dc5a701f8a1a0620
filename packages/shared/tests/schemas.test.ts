import { describe, it, expect } from 'vitest';
import {
    ClassificationResultSchema,
    EngineConfigSchema,
    JobRecordSchema,
    NormalizedRowSchema,
    OracleResponseSchema,
    StoredRecordSchema,
    VendorSchema,
    VendorSeedSchema,
} from '../src/schemas.js';
import { ORACLE_DEFAULTS, PIPELINE_DEFAULTS, VENDOR_MATCHING } from '../src/constants.js';

describe('NormalizedRowSchema', () => {
    const validRow = {
        date: '2024-01-05',
        amount: '-1200.00',
        currency: 'DKK',
        description: 'netflix.com',
        account: 'acc1',
    };

    it('validates a normalized row', () => {
        expect(NormalizedRowSchema.safeParse(validRow).success).toBe(true);
    });

    it('rejects a native number amount', () => {
        expect(NormalizedRowSchema.safeParse({ ...validRow, amount: -1200 }).success).toBe(false);
    });

    it('rejects lower-case currency codes', () => {
        expect(NormalizedRowSchema.safeParse({ ...validRow, currency: 'dkk' }).success).toBe(false);
    });

    it('rejects an empty description', () => {
        expect(NormalizedRowSchema.safeParse({ ...validRow, description: '' }).success).toBe(false);
    });
});

describe('ClassificationResultSchema', () => {
    const valid = { category: 'vendor_payment', confidence: 0.9, vendor_reference: null, rationale: 'subscription' };

    it('accepts a result without a vendor', () => {
        expect(ClassificationResultSchema.safeParse(valid).success).toBe(true);
    });

    it('accepts a well-formed vendor reference', () => {
        expect(ClassificationResultSchema.safeParse({ ...valid, vendor_reference: 'v_13ed070478ef' }).success).toBe(
            true
        );
    });

    it('rejects a malformed vendor reference', () => {
        expect(ClassificationResultSchema.safeParse({ ...valid, vendor_reference: 'netflix' }).success).toBe(false);
    });

    it('rejects categories outside the fixed set', () => {
        expect(ClassificationResultSchema.safeParse({ ...valid, category: 'groceries' }).success).toBe(false);
    });
});

describe('OracleResponseSchema', () => {
    it('coerces a numeric string confidence', () => {
        expect(OracleResponseSchema.parse({ category: 'bank_fee', confidence: '0.75', rationale: 'fee' })).toEqual({
            category: 'bank_fee',
            confidence: 0.75,
            rationale: 'fee',
        });
    });

    it('falls back from rationale to reasoning to empty', () => {
        expect(OracleResponseSchema.parse({ category: 'bank_fee', confidence: 1, reasoning: 'why' }).rationale).toBe(
            'why'
        );
        expect(OracleResponseSchema.parse({ category: 'bank_fee', confidence: 1 }).rationale).toBe('');
    });

    it('rejects null, boolean and blank confidences', () => {
        for (const confidence of [null, true, '', ' ']) {
            expect(OracleResponseSchema.safeParse({ category: 'bank_fee', confidence }).success).toBe(false);
        }
    });

    it('rejects out-of-range confidence', () => {
        expect(OracleResponseSchema.safeParse({ category: 'bank_fee', confidence: -0.1 }).success).toBe(false);
        expect(OracleResponseSchema.safeParse({ category: 'bank_fee', confidence: 1.01 }).success).toBe(false);
    });
});

describe('VendorSchema', () => {
    const vendor = {
        vendor_id: 'v_13ed070478ef',
        canonical_name: 'Netflix',
        aliases: ['NETFLIX.COM'],
        metadata: {},
        transaction_count: 0,
        version: 0,
        created_at: '2024-02-01T10:00:00.000Z',
    };

    it('validates a vendor', () => {
        expect(VendorSchema.safeParse(vendor).success).toBe(true);
    });

    it('rejects negative counters', () => {
        expect(VendorSchema.safeParse({ ...vendor, transaction_count: -1 }).success).toBe(false);
    });

    it('defaults aliases and metadata on catalogue seeds', () => {
        expect(VendorSeedSchema.parse({ name: 'Netflix' })).toEqual({ name: 'Netflix', aliases: [], metadata: {} });
    });
});

describe('StoredRecordSchema', () => {
    it('defaults superseded to an empty history', () => {
        const record = StoredRecordSchema.parse({
            fingerprint: '0123456789abcdef0123456789abcdef',
            batch_id: 'b_test',
            row: { date: '2024-01-05', amount: '10.00', currency: 'DKK', description: 'fee', account: 'acc1' },
            raw_description: 'FEE',
            classification: { category: 'bank_fee', confidence: 0.9, vendor_reference: null, rationale: '' },
            vendor_id: null,
            vendor_confidence: null,
            confidence: 0.9,
            needs_review: false,
            review_reasons: [],
            source: 'oracle',
            created_at: '2024-02-01T10:00:00.000Z',
        });

        expect(record.superseded).toEqual([]);
    });
});

describe('JobRecordSchema', () => {
    it('only stores terminal statuses', () => {
        const record = { batch_id: 'b_1', attempt: 1, total: 1, processed: 1, finished_at: '2024-02-01T10:00:00.000Z' };

        expect(JobRecordSchema.safeParse({ ...record, status: 'completed' }).success).toBe(true);
        expect(JobRecordSchema.safeParse({ ...record, status: 'running' }).success).toBe(false);
    });
});

describe('EngineConfigSchema', () => {
    it('fills every section from defaults', () => {
        const config = EngineConfigSchema.parse({});

        expect(config.vendor.acceptThreshold).toBe(VENDOR_MATCHING.ACCEPT_THRESHOLD);
        expect(config.vendor.vendorCategories).toEqual(['vendor_payment', 'customer_payment_received']);
        expect(config.pipeline.maxConcurrency).toBe(PIPELINE_DEFAULTS.MAX_CONCURRENCY);
        expect(config.oracle.maxAttempts).toBe(ORACLE_DEFAULTS.MAX_ATTEMPTS);
        expect(config.queue.workerConcurrency).toBe(1);
        expect(config.currencyMinorUnits).toEqual({});
    });

    it('rejects a review threshold above the accept threshold', () => {
        const result = EngineConfigSchema.safeParse({ vendor: { acceptThreshold: 0.5, reviewThreshold: 0.6 } });

        expect(result.success).toBe(false);
        expect(result.error?.issues[0]?.message).toBe('reviewThreshold must not exceed acceptThreshold');
    });

    it('rejects a concurrency below 1', () => {
        expect(EngineConfigSchema.safeParse({ pipeline: { maxConcurrency: 0 } }).success).toBe(false);
    });

    it('rejects unknown vendor categories', () => {
        expect(EngineConfigSchema.safeParse({ vendor: { vendorCategories: ['groceries'] } }).success).toBe(false);
    });

    it('accepts currency minor-unit overrides', () => {
        expect(EngineConfigSchema.parse({ currencyMinorUnits: { XAU: 4 } }).currencyMinorUnits).toEqual({ XAU: 4 });
    });
});
