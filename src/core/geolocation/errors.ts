/**
 * Geolocation Error Types
 */

import type { LocationErrorCodeType } from '@/types';
import { LocationErrorCode } from '@/types';

/**
 * No origin coordinate could be obtained for a proximity search
 */
export class LocationUnavailableError extends Error {
    constructor(
        message: string,
        public readonly code: LocationErrorCodeType = LocationErrorCode.UNAVAILABLE,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'LocationUnavailableError';
    }

    /** Check if coordinates were given but out of range */
    isInvalidCoordinates(): boolean {
        return this.code === LocationErrorCode.INVALID_COORDINATES;
    }

    /** Get user-friendly error message */
    getUserMessage(): string {
        switch (this.code) {
            case LocationErrorCode.INVALID_COORDINATES:
                return `${this.message}. Latitude must be within ±90 and longitude within ±180.`;
            case LocationErrorCode.UNAVAILABLE:
                return 'Location unavailable. Pass --lat and --lon, set CITYBUS_LAT and CITYBUS_LON, or save one with --save-location.';
            default:
                return 'An unknown error occurred while determining your location.';
        }
    }
}
