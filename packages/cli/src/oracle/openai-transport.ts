/**
 * OpenAI chat completions as an OracleTransport (JSON mode).
 */

import OpenAI, {
    APIConnectionError,
    APIConnectionTimeoutError,
    APIError,
    APIUserAbortError,
    RateLimitError,
} from 'openai';
import { OracleTransientError } from '@txnflow/shared';
import { buildSystemPrompt, buildUserPrompt } from './prompt.js';
import type { OracleRequest, OracleTransport } from './types.js';

export interface OpenAiTransportOptions {
    apiKey: string;
    baseURL?: string;
    model: string;
}

export class OpenAiTransport implements OracleTransport {
    private readonly systemPrompt = buildSystemPrompt();

    constructor(
        private readonly client: OpenAI,
        private readonly model: string
    ) {}

    static create(options: OpenAiTransportOptions): OpenAiTransport {
        // Retries are owned by OracleClient
        const client = new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
        return new OpenAiTransport(client, options.model);
    }

    async send(request: OracleRequest, signal: AbortSignal): Promise<unknown> {
        let content: string | null | undefined;
        try {
            const completion = await this.client.chat.completions.create(
                {
                    model: this.model,
                    messages: [
                        { role: 'system', content: this.systemPrompt },
                        { role: 'user', content: buildUserPrompt(request) },
                    ],
                    response_format: { type: 'json_object' },
                    temperature: 0,
                },
                { signal }
            );
            content = completion.choices[0]?.message?.content;
        } catch (error) {
            throw toTransportError(error);
        }

        if (!content) {
            throw new Error('Oracle returned an empty completion');
        }
        const body: unknown = JSON.parse(content);
        return body;
    }
}

/**
 * Map SDK errors onto the retry taxonomy. Non-transient errors pass through
 * unchanged.
 */
export function toTransportError(error: unknown): unknown {
    if (error instanceof APIUserAbortError) {
        return error;
    }
    if (error instanceof APIConnectionTimeoutError) {
        return new OracleTransientError('timeout', error.message, { cause: error });
    }
    if (error instanceof APIConnectionError) {
        return new OracleTransientError('network', error.message, { cause: error });
    }
    if (error instanceof RateLimitError) {
        return new OracleTransientError('rate_limit', error.message, { cause: error });
    }
    if (error instanceof APIError && error.status !== undefined && error.status >= 500) {
        return new OracleTransientError('server', error.message, { cause: error });
    }
    return error;
}
