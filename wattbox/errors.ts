import { FetchError, Response } from 'node-fetch';

const RESPONSE_PREVIEW_LENGTH = 500;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Raised for any final response outside the 2xx range.
 */
export class WattBoxHttpError extends Error {
    constructor(
        readonly status: number,
        readonly statusText: string,
        readonly url: string,
        readonly body: string,
    ) {
        super(`${[String(status), statusText].filter(Boolean).join(' ')} for url: ${url}`);
        this.name = 'WattBoxHttpError';
    }

    static async fromResponse(response: Response): Promise<WattBoxHttpError> {
        const body = await response.text();
        return new WattBoxHttpError(response.status, response.statusText, response.url, body);
    }
}

export interface DescribeOptions {
    baseUrl: string;
    verbose: boolean;
}

/**
 * Turns whatever the run threw into the lines shown on stderr.
 */
export function describeError(error: unknown, { baseUrl, verbose }: DescribeOptions): string[] {
    if (error instanceof WattBoxHttpError) {
        const lines = [`✗ HTTP Error: ${error.message}`];
        if (verbose) {
            lines.push(`Response: ${error.body.slice(0, RESPONSE_PREVIEW_LENGTH)}`);
        }
        return lines;
    }

    if (error instanceof FetchError) {
        if (error.type === 'request-timeout') {
            return ['✗ Timeout Error: Request timed out'];
        }
        if (error.type === 'system') {
            const lines = [`✗ Connection Error: Could not connect to ${baseUrl}`];
            if (verbose) {
                lines.push(`Details: ${error.message}`);
            }
            return lines;
        }
        return [`✗ Request Error: ${error.message}`];
    }

    if (error instanceof ConfigError) {
        return [`✗ Configuration Error: ${error.message}`];
    }

    const lines = [`✗ Unexpected Error: ${error instanceof Error ? error.message : String(error)}`];
    if (verbose && error instanceof Error && error.stack) {
        lines.push(error.stack);
    }
    return lines;
}
