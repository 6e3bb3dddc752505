/**
 * Location Providers
 * Sources of the origin coordinate for nearest-stop search
 */

import { Logger } from '@utils/logger';
import { getSavedLocation } from '@utils/location-storage';
import type { Coordinates } from '@/types';
import { CoordinatesSchema } from '@/types';

/** A device or stored location; null when it has nothing to offer */
export interface LocationProvider {
    readonly name: string;
    getLocation(): Promise<Coordinates | null>;
}

/**
 * Parse a latitude/longitude pair given as strings
 * @returns Coordinates, or null when either value is missing, non-numeric or out of range
 */
export function parseCoordinates(
    latitude: string | undefined,
    longitude: string | undefined
): Coordinates | null {
    if (!latitude?.trim() || !longitude?.trim()) {
        return null;
    }
    const result = CoordinatesSchema.safeParse({
        latitude: Number(latitude),
        longitude: Number(longitude),
    });
    return result.success ? result.data : null;
}

/**
 * Reads CITYBUS_LAT / CITYBUS_LON, e.g. exported by a phone's location helper
 */
export class EnvironmentLocationProvider implements LocationProvider {
    readonly name = 'environment';

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

    async getLocation(): Promise<Coordinates | null> {
        const { CITYBUS_LAT, CITYBUS_LON } = this.env;
        if (CITYBUS_LAT === undefined && CITYBUS_LON === undefined) {
            return null;
        }

        const coordinates = parseCoordinates(CITYBUS_LAT, CITYBUS_LON);
        if (!coordinates) {
            Logger.warn('Ignoring invalid CITYBUS_LAT/CITYBUS_LON', {
                latitude: CITYBUS_LAT,
                longitude: CITYBUS_LON,
            });
        }
        return coordinates;
    }
}

/**
 * Location saved earlier with --save-location
 */
export class SavedLocationProvider implements LocationProvider {
    readonly name = 'saved';

    constructor(
        private readonly dataDir: string,
        private readonly now: () => number = Date.now
    ) {}

    async getLocation(): Promise<Coordinates | null> {
        const saved = await getSavedLocation(this.dataDir, this.now());
        return saved?.coordinates ?? null;
    }
}

/**
 * First provider with an answer wins
 */
export class ChainedLocationProvider implements LocationProvider {
    readonly name = 'chain';

    constructor(private readonly providers: readonly LocationProvider[]) {}

    async getLocation(): Promise<Coordinates | null> {
        for (const provider of this.providers) {
            const coordinates = await provider.getLocation();
            if (coordinates) {
                Logger.debug('Location from provider', { provider: provider.name });
                return coordinates;
            }
        }
        return null;
    }
}
