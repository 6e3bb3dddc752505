/**
 * Transit API Error Types
 */

import type { Endpoint, TransitErrorCodeType } from '@/types';
import { TransitErrorCode } from '@/types';

/**
 * Base error for credential and API failures
 * Provides structured error information for the CLI
 */
export class TransitApiError extends Error {
    constructor(
        message: string,
        public readonly code: TransitErrorCodeType,
        public readonly endpoint: Endpoint,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'TransitApiError';
    }

    /** Get user-friendly error message */
    getUserMessage(): string {
        switch (this.code) {
            case TransitErrorCode.CREDENTIAL_FETCH_FAILED:
                return 'Could not reach the CityBus website to obtain an access token.';
            case TransitErrorCode.TOKEN_NOT_FOUND:
                return 'No access token found on the CityBus website. The page layout may have changed.';
            case TransitErrorCode.NETWORK_ERROR:
                return `Network error while fetching ${this.endpoint} data. Check your connection and try again.`;
            case TransitErrorCode.INVALID_PAYLOAD:
                return `The CityBus service returned unexpected ${this.endpoint} data.`;
            case TransitErrorCode.INVALID_QUERY:
                return this.message;
            default:
                return `Error fetching ${this.endpoint} data: ${this.message}`;
        }
    }
}

/** The token page could not be fetched */
export class CredentialFetchError extends TransitApiError {
    constructor(message: string, cause?: Error) {
        super(message, TransitErrorCode.CREDENTIAL_FETCH_FAILED, 'token', cause);
        this.name = 'CredentialFetchError';
    }
}

/** The token page was fetched but holds no token in the expected shape */
export class TokenNotFoundError extends TransitApiError {
    constructor(message = 'No bearer token found in page script') {
        super(message, TransitErrorCode.TOKEN_NOT_FOUND, 'token');
        this.name = 'TokenNotFoundError';
    }
}

/** Transport failure or timeout on an API call */
export class NetworkError extends TransitApiError {
    constructor(message: string, endpoint: Endpoint, cause?: Error) {
        super(message, TransitErrorCode.NETWORK_ERROR, endpoint, cause);
        this.name = 'NetworkError';
    }
}

/** Non-2xx response from an API call */
export class HttpStatusError extends TransitApiError {
    constructor(
        public readonly status: number,
        endpoint: Endpoint,
        /** Set only where a 401 means the scraped token was rejected */
        public readonly tokenExpired = false
    ) {
        super(`HTTP ${status} from ${endpoint} endpoint`, TransitErrorCode.HTTP_STATUS, endpoint);
        this.name = 'HttpStatusError';
    }

    /** Check if the bearer token was rejected */
    isTokenExpired(): boolean {
        return this.tokenExpired;
    }

    override getUserMessage(): string {
        if (this.tokenExpired) {
            return '401 Unauthorized - Token may be expired. Run the command again to fetch a new one.';
        }
        return `Error fetching ${this.endpoint} data: HTTP ${this.status}`;
    }
}

/** Response body is not JSON or lacks required fields */
export class PayloadError extends TransitApiError {
    constructor(message: string, endpoint: Endpoint, cause?: Error) {
        super(message, TransitErrorCode.INVALID_PAYLOAD, endpoint, cause);
        this.name = 'PayloadError';
    }
}

/** Stop code, day or radius outside the accepted range; raised before any request */
export class InvalidQueryError extends TransitApiError {
    constructor(message: string, endpoint: Endpoint) {
        super(message, TransitErrorCode.INVALID_QUERY, endpoint);
        this.name = 'InvalidQueryError';
    }
}
