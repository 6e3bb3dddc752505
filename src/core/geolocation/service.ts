/**
 * Geolocation Service
 * Resolves the origin for nearest-stop search
 */

import { Logger } from '@utils/logger';
import { LocationUnavailableError } from './errors';
import type { LocationProvider } from './providers';
import type { Coordinates } from '@/types';
import { CoordinatesSchema, LocationErrorCode } from '@/types';

/**
 * Result type for location acquisition
 */
export type LocationResult =
    | { success: true; coordinates: Coordinates; source: 'explicit' | 'provider' }
    | { success: false; error: LocationUnavailableError };

export class GeolocationService {
    constructor(private readonly provider: LocationProvider) {}

    /**
     * Use the explicit origin when given, otherwise ask the provider
     */
    async getLocation(origin?: Coordinates): Promise<LocationResult> {
        if (origin) {
            const validated = CoordinatesSchema.safeParse(origin);
            if (!validated.success) {
                return {
                    success: false,
                    error: new LocationUnavailableError(
                        `Invalid coordinates ${origin.latitude},${origin.longitude}`,
                        LocationErrorCode.INVALID_COORDINATES,
                        validated.error
                    ),
                };
            }
            return { success: true, coordinates: validated.data, source: 'explicit' };
        }

        const coordinates = await this.provider.getLocation();
        if (!coordinates) {
            Logger.warn('No location available from any provider');
            return {
                success: false,
                error: new LocationUnavailableError('No location available'),
            };
        }

        return { success: true, coordinates, source: 'provider' };
    }

    /**
     * Like getLocation, but throws
     * @throws LocationUnavailableError
     */
    async requireLocation(origin?: Coordinates): Promise<Coordinates> {
        const result = await this.getLocation(origin);
        if (!result.success) {
            throw result.error;
        }
        return result.coordinates;
    }
}
