import type { ClassificationResult, StoredRecord } from '@txnflow/shared';

export function classification(overrides: Partial<ClassificationResult> = {}): ClassificationResult {
    return {
        category: 'vendor_payment',
        confidence: 0.9,
        vendor_reference: null,
        rationale: 'subscription',
        ...overrides,
    };
}

export function storedRecord(fingerprint: string, overrides: Partial<StoredRecord> = {}): StoredRecord {
    return {
        fingerprint,
        batch_id: 'b_test',
        row: {
            date: '2024-01-05',
            amount: '1200.00',
            currency: 'DKK',
            description: 'netflix.com',
            account: 'acc1',
        },
        raw_description: 'NETFLIX.COM',
        classification: classification(),
        vendor_id: null,
        vendor_confidence: null,
        confidence: 0.9,
        needs_review: false,
        review_reasons: [],
        source: 'oracle',
        created_at: '2024-02-01T10:00:00.000Z',
        superseded: [],
        ...overrides,
    };
}

export const FP_A = 'a'.repeat(32);
export const FP_B = 'b'.repeat(32);
