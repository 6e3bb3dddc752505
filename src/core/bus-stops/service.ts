/**
 * Bus Stop Service
 * Nearest-stop search and name lookup over the cached directory
 */

import { Logger } from '@utils/logger';
import type { GeolocationService } from '@core/geolocation';
import { BusStopError } from './errors';
import { findStopsWithin } from './proximity';
import type { StopDirectoryCache } from './cache';
import type { Coordinates, ProximityResult, StopNameMap } from '@/types';
import { StopErrorCode } from '@/types';

/**
 * Result type for a nearby search
 */
export type NearbyStopsResult =
    | { success: true; origin: Coordinates; results: ProximityResult[] }
    | { success: false; error: Error };

export interface BusStopServiceOptions {
    cache: StopDirectoryCache;
    geolocation: GeolocationService;
}

/**
 * BusStopService - Find nearby stops and look up names
 */
export class BusStopService {
    constructor(private readonly options: BusStopServiceOptions) {}

    /**
     * Find stops within a radius, nearest first
     * @param maxDistanceMeters - Search radius
     * @param origin - Search centre; the location provider is asked when omitted
     * @throws LocationUnavailableError when no origin can be determined
     * @throws BusStopError for a negative or non-numeric radius
     */
    async findNearby(maxDistanceMeters: number, origin?: Coordinates): Promise<ProximityResult[]> {
        if (!Number.isFinite(maxDistanceMeters) || maxDistanceMeters < 0) {
            throw new BusStopError(
                `Search radius must be zero or more meters, got ${maxDistanceMeters}`,
                StopErrorCode.INVALID_RADIUS
            );
        }

        const location = await this.options.geolocation.requireLocation(origin);
        const directory = await this.options.cache.getDirectory();
        const results = findStopsWithin(directory, location, maxDistanceMeters);

        Logger.debug('Found nearby stops', {
            radius: maxDistanceMeters,
            count: results.length,
            nearest: results[0]?.stop.name,
            distance: results[0]?.distanceMeters,
        });

        return results;
    }

    /**
     * findNearby as a result union, for the CLI
     */
    async getNearby(maxDistanceMeters: number, origin?: Coordinates): Promise<NearbyStopsResult> {
        try {
            const location = await this.options.geolocation.requireLocation(origin);
            const results = await this.findNearby(maxDistanceMeters, location);
            return { success: true, origin: location, results };
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            Logger.warn('Nearby search failed', { name: failure.name, message: failure.message });
            return { success: false, error: failure };
        }
    }

    /**
     * Code to name map, optionally filtered by a case-insensitive substring of the name
     */
    async searchNames(query?: string): Promise<StopNameMap> {
        const names = await this.options.cache.getNameMap();
        const needle = query?.trim().toLocaleLowerCase();
        if (!needle) {
            return names;
        }

        const matches: StopNameMap = {};
        for (const [code, name] of Object.entries(names)) {
            if (name.toLocaleLowerCase().includes(needle)) {
                matches[code] = name;
            }
        }
        return matches;
    }

    /**
     * Name of a stop if the directory is already cached; never triggers a fetch
     */
    async getCachedStopName(code: number): Promise<string | null> {
        if (!(await this.options.cache.isWarm())) {
            return null;
        }
        const names = await this.options.cache.getNameMap();
        return names[String(code)] ?? null;
    }
}
