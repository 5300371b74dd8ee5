import type { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logger/index.js';
import { PulseboardRuntimeError } from '../errors/PulseboardRuntimeError.js';
import { ConnectorError, type ConnectorService } from './errors.js';

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface RequestOptions {
    timeoutMs: number;
    fetch?: FetchFn;
}

/**
 * Send a request to an upstream API and validate the JSON body against a schema.
 * Non-2xx responses, timeouts and malformed payloads all surface as connector errors.
 */
export async function requestJson<T>(
    service: ConnectorService,
    url: string | URL,
    init: RequestInit,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: RequestOptions
): Promise<T> {
    const fetchFn = options.fetch ?? fetch;
    const method = init.method ?? 'GET';
    logger.debug(`${service}: ${method} ${url.toString()}`);

    let response: Response;
    try {
        response = await fetchFn(url, {
            ...init,
            signal: AbortSignal.timeout(options.timeoutMs),
        });
    } catch (error) {
        if (error instanceof Error && error.name === 'TimeoutError') {
            throw ConnectorError.timeout(service, options.timeoutMs);
        }
        throw ConnectorError.network(
            service,
            error instanceof Error ? error.message : String(error)
        );
    }

    if (!response.ok) {
        const body = await response.text();
        throw ConnectorError.requestFailed(service, response.status, body);
    }

    let payload: unknown;
    try {
        payload = await response.json();
    } catch (error) {
        throw ConnectorError.invalidResponse(
            service,
            error instanceof Error ? error.message : 'body is not JSON'
        );
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        throw ConnectorError.invalidResponse(
            service,
            first ? `${first.path.join('.') || '(root)'}: ${first.message}` : 'schema mismatch'
        );
    }
    return parsed.data;
}

export function isConnectorError(error: unknown): error is PulseboardRuntimeError {
    return error instanceof PulseboardRuntimeError && error.scope === 'connector';
}
