/**
 * Record-level confidence and review flags.
 */

import type { ClassificationResult } from '../types/index.js';
import { REVIEW_REASONS } from '../types/index.js';
import { round4 } from '../vendor/similarity.js';

/** Outcome of vendor resolution as seen by aggregation. */
export type VendorDecision = 'matched' | 'review' | 'created';

export interface VendorSignal {
    confidence: number;
    decision: VendorDecision;
}

export interface AggregateOptions {
    reviewConfidenceThreshold: number;
}

export interface AggregatedConfidence {
    confidence: number;
    needsReview: boolean;
    reviewReasons: string[];
}

/** Weight of the category confidence that does not depend on the vendor match. */
const CATEGORY_FLOOR = 0.7;

/**
 * Blend category confidence with vendor match confidence.
 *
 * Without a vendor the category confidence stands alone. With one:
 * category × (0.7 + 0.3 × vendor), so a weak vendor match can only pull the
 * record down, never up.
 *
 * @example aggregateConfidence(result(0.9), { confidence: 0.7778, decision: 'review' }, opts)
 *          // confidence 0.84, reasons ['vendor_match_review']
 */
export function aggregateConfidence(
    classification: ClassificationResult,
    vendor: VendorSignal | null,
    options: AggregateOptions
): AggregatedConfidence {
    const confidence = vendor
        ? round4(classification.confidence * (CATEGORY_FLOOR + (1 - CATEGORY_FLOOR) * vendor.confidence))
        : classification.confidence;

    const reviewReasons: string[] = [];
    if (classification.category === 'not_categorized') {
        reviewReasons.push(REVIEW_REASONS.NOT_CATEGORIZED);
    }
    if (vendor?.decision === 'review') {
        reviewReasons.push(REVIEW_REASONS.VENDOR_MATCH_REVIEW);
    }
    if (confidence < options.reviewConfidenceThreshold) {
        reviewReasons.push(REVIEW_REASONS.LOW_CONFIDENCE);
    }

    return {
        confidence,
        needsReview: reviewReasons.length > 0,
        reviewReasons,
    };
}
