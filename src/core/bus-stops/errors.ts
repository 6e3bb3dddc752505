/**
 * Bus Stop Error Types
 */

import type { StopErrorCodeType } from '@/types';
import { StopErrorCode } from '@/types';

/**
 * Custom error for stop directory failures
 * Provides structured error information for the CLI
 */
export class BusStopError extends Error {
    constructor(
        message: string,
        public readonly code: StopErrorCodeType,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'BusStopError';
    }

    /** Get user-friendly error message */
    getUserMessage(): string {
        switch (this.code) {
            case StopErrorCode.CACHE_UNREADABLE:
                return 'The local stop cache is unreadable and will be rebuilt.';
            case StopErrorCode.INVALID_RADIUS:
                return this.message;
            default:
                return 'An error occurred loading stop information.';
        }
    }
}

/**
 * A cache file exists but could not be read or parsed.
 * Recoverable: the cache treats it as absent and fetches again.
 */
export class CacheReadError extends BusStopError {
    constructor(
        message: string,
        public readonly filePath: string,
        cause?: Error
    ) {
        super(message, StopErrorCode.CACHE_UNREADABLE, cause);
        this.name = 'CacheReadError';
    }
}
