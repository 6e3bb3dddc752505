/**
 * Great-circle distance and radius search over the stop directory
 */

import type { Coordinates, LocatedStop, ProximityResult, StopRecord } from '@/types';

/** Mean Earth radius in meters */
export const EARTH_RADIUS_METERS = 6371000;

function toRadians(degrees: number): number {
    return degrees * (Math.PI / 180);
}

/**
 * Calculate distance between two coordinates (Haversine formula)
 * Returns distance in meters
 */
export function haversineDistance(from: Coordinates, to: Coordinates): number {
    const dLat = toRadians(to.latitude - from.latitude);
    const dLon = toRadians(to.longitude - from.longitude);
    const lat1 = toRadians(from.latitude);
    const lat2 = toRadians(to.latitude);

    const a =
        Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;

    return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(Math.min(1, a)));
}

/**
 * Narrow a stop to one with usable coordinates
 */
export function hasCoordinates(stop: StopRecord): stop is LocatedStop {
    return (
        typeof stop.latitude === 'number' &&
        typeof stop.longitude === 'number' &&
        Number.isFinite(stop.latitude) &&
        Number.isFinite(stop.longitude)
    );
}

/**
 * Stops within maxDistanceMeters of origin, nearest first.
 * Stops without coordinates are skipped; ties keep directory order.
 */
export function findStopsWithin(
    directory: readonly StopRecord[],
    origin: Coordinates,
    maxDistanceMeters: number
): ProximityResult[] {
    return directory
        .filter(hasCoordinates)
        .map(stop => ({ stop, distanceMeters: haversineDistance(origin, stop) }))
        .filter(result => result.distanceMeters <= maxDistanceMeters)
        .sort((a, b) => a.distanceMeters - b.distanceMeters);
}
