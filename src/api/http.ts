/**
 * HTTP helpers shared by the token resolver and the API client
 *
 * Note: the CityBus endpoints reject requests that do not look like they come from
 * the official web front-end, hence the browser headers on every call.
 */

import { Logger } from '@utils/logger';
import { HttpStatusError, NetworkError, PayloadError } from './errors';
import type { Endpoint } from '@/types';

export interface BrowserProfile {
    /** Origin of the official web front-end, e.g. https://patra.citybus.gr */
    webOrigin: string;
    userAgent: string;
}

/** Request options for a single GET */
export interface GetOptions {
    endpoint: Endpoint;
    timeout: number;
    headers: Record<string, string>;
    /** Mark a 401 from this endpoint as a rejected token */
    flagUnauthorized?: boolean;
}

/**
 * Headers that make a request look like it comes from the web front-end
 */
export function makeBrowserHeaders(profile: BrowserProfile): Record<string, string> {
    const origin = profile.webOrigin.replace(/\/+$/, '');
    return {
        'User-Agent': profile.userAgent,
        Accept: 'application/json, text/javascript, */*; q=0.01',
        Referer: `${origin}/`,
        Origin: origin,
    };
}

/**
 * Map a fetch or body-read failure to a NetworkError
 */
function toNetworkError(error: unknown, options: GetOptions): NetworkError {
    const cause = error instanceof Error ? error : undefined;
    const reason =
        cause?.name === 'TimeoutError'
            ? `timed out after ${options.timeout}ms`
            : (cause?.message ?? String(error));
    Logger.error(`Request to ${options.endpoint} endpoint failed`, reason);
    return new NetworkError(`Request failed: ${reason}`, options.endpoint, cause);
}

/**
 * GET a URL and return the response, mapping transport failures and non-2xx statuses
 * @throws NetworkError on transport failure or timeout
 * @throws HttpStatusError on a non-2xx status
 */
export async function get(url: string, options: GetOptions): Promise<Response> {
    Logger.debug('GET', { endpoint: options.endpoint, url });

    let response: Response;
    try {
        response = await fetch(url, {
            method: 'GET',
            headers: options.headers,
            signal: AbortSignal.timeout(options.timeout),
        });
    } catch (error) {
        throw toNetworkError(error, options);
    }

    if (!response.ok) {
        const tokenExpired = options.flagUnauthorized === true && response.status === 401;
        Logger.warn(`${options.endpoint} endpoint returned ${response.status}`, {
            tokenExpired,
        });
        throw new HttpStatusError(response.status, options.endpoint, tokenExpired);
    }

    return response;
}

/**
 * GET a URL and read the whole body as text
 * @throws NetworkError when the body stream fails or times out part way
 */
export async function getText(url: string, options: GetOptions): Promise<string> {
    const response = await get(url, options);

    try {
        return await response.text();
    } catch (error) {
        throw toNetworkError(error, options);
    }
}

/**
 * GET a URL and parse the body as JSON
 * @throws PayloadError when the body is not JSON
 */
export async function getJson(url: string, options: GetOptions): Promise<unknown> {
    const text = await getText(url, options);

    try {
        return JSON.parse(text);
    } catch (error) {
        throw new PayloadError(
            'Response body is not valid JSON',
            options.endpoint,
            error instanceof Error ? error : undefined
        );
    }
}
