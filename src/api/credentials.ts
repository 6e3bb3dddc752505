/**
 * Bearer Token Resolver
 *
 * Note: the CityBus REST API has no public credential flow. The web front-end embeds
 * a bearer token in an inline script, so the token is scraped from that page.
 * It may change without notice.
 */

import { Logger } from '@utils/logger';
import { CredentialFetchError, TokenNotFoundError, TransitApiError } from './errors';
import { getText, makeBrowserHeaders } from './http';
import type { BrowserProfile } from './http';

/** Source of bearer tokens for the API client */
export interface CredentialResolver {
    resolveToken(): Promise<string>;
}

export interface PageTokenResolverOptions extends BrowserProfile {
    /** Page whose inline script assigns the token */
    pageUrl: string;
    timeout: number;
}

/** Matches the inline `const token = '...'` assignment */
export const TOKEN_PATTERN = /const token = '([^']+)'/;

/**
 * Extract the token from page HTML
 * @returns The token, or null when the assignment is absent
 */
export function extractToken(html: string): string | null {
    const match = TOKEN_PATTERN.exec(html);
    return match?.[1] ?? null;
}

/**
 * Resolves a token by fetching the web front-end page on every call.
 * Token lifetime is unknown, so nothing is cached here.
 */
export class PageTokenResolver implements CredentialResolver {
    constructor(private readonly options: PageTokenResolverOptions) {}

    async resolveToken(): Promise<string> {
        const { pageUrl, timeout } = this.options;
        Logger.debug('Resolving bearer token', { pageUrl });

        let html: string;
        try {
            html = await getText(pageUrl, {
                endpoint: 'token',
                timeout,
                headers: {
                    ...makeBrowserHeaders(this.options),
                    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                },
            });
        } catch (error) {
            if (error instanceof TransitApiError) {
                throw new CredentialFetchError(
                    `Error getting bearer token: ${error.message}`,
                    error
                );
            }
            throw new CredentialFetchError(
                `Error getting bearer token: ${String(error)}`,
                error instanceof Error ? error : undefined
            );
        }

        const token = extractToken(html);
        if (!token) {
            Logger.error('No bearer token found in page JavaScript', { pageUrl });
            throw new TokenNotFoundError();
        }

        Logger.debug('Bearer token resolved', { length: token.length });
        return token;
    }
}
