/**
 * Error taxonomy for txnflow.
 *
 * Row-scoped errors (ValidationError, OracleError, non-systemic StorageError)
 * end a single row as failed. Systemic errors abort the rest of the batch.
 */

export type RowField = 'date' | 'amount' | 'currency' | 'description' | 'account';

/**
 * Bad input row. Names the offending field.
 */
export class ValidationError extends Error {
    override readonly name = 'ValidationError';

    constructor(
        readonly field: RowField,
        message: string
    ) {
        super(`${field}: ${message}`);
    }
}

export type OracleErrorKind = 'fatal' | 'exhausted';

export type TransientReason = 'rate_limit' | 'timeout' | 'server' | 'network';

/**
 * Terminal oracle failure as seen by the pipeline.
 * `fatal`: non-transient (bad request, auth, invalid response).
 * `exhausted`: transient failures outlasted the retry budget.
 */
export class OracleError extends Error {
    override readonly name = 'OracleError';
    /** Reason of the last transient failure, for `exhausted` */
    readonly lastReason: TransientReason | undefined;

    constructor(
        readonly kind: OracleErrorKind,
        message: string,
        readonly attempts: number,
        options?: { cause?: unknown; lastReason?: TransientReason }
    ) {
        super(message, options);
        this.lastReason = options?.lastReason;
    }
}

/**
 * Retryable failure raised by an oracle transport.
 */
export class OracleTransientError extends Error {
    override readonly name = 'OracleTransientError';

    constructor(
        readonly reason: TransientReason,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * A compare-and-swap on a vendor lost to a concurrent writer.
 */
export class RegistryConflict extends Error {
    override readonly name = 'RegistryConflict';

    constructor(readonly vendorId: string) {
        super(`Concurrent update to vendor ${vendorId}`);
    }
}

/**
 * A batch id was submitted while its job is still live or finished.
 * Callers get the existing handle; this is informational only.
 */
export class DuplicateSubmission extends Error {
    override readonly name = 'DuplicateSubmission';

    constructor(readonly batchId: string) {
        super(`Batch ${batchId} already submitted`);
    }
}

/**
 * Storage failure. `systemic` means the store itself is unavailable and the
 * remaining rows would fail the same way.
 */
export class StorageError extends Error {
    override readonly name = 'StorageError';

    constructor(
        message: string,
        readonly systemic: boolean = false,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * Abort reason used when a batch runs past its deadline.
 */
export class BatchDeadlineExceeded extends Error {
    override readonly name = 'BatchDeadlineExceeded';

    constructor(readonly deadlineMs: number) {
        super(`Batch exceeded its deadline of ${deadlineMs}ms`);
    }
}

/**
 * Abort reason used when a systemic error stops the remaining rows.
 */
export class BatchAborted extends Error {
    override readonly name = 'BatchAborted';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}
