/**
 * What the oracle is asked about a transaction.
 */
export interface OracleRequest {
    descriptionText: string;
    /** Normalized decimal string, e.g. "-1200.00" */
    amount: string;
    currency: string;
}

/**
 * Raw access to a classification backend.
 *
 * Implementations return the decoded response body unvalidated and signal
 * retryable failures by throwing OracleTransientError. Anything else they
 * throw is treated as fatal.
 */
export interface OracleTransport {
    send(request: OracleRequest, signal: AbortSignal): Promise<unknown>;
}

export interface OracleRetryOptions {
    maxAttempts: number;
    timeoutMs: number;
    backoff: {
        minTimeoutMs: number;
        maxTimeoutMs: number;
        factor: number;
    };
    /** Jitter on backoff waits. Off unless set. */
    randomize?: boolean;
}
