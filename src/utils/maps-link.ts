/**
 * Maps link utilities for walking directions to a stop
 */

import type { Coordinates } from '@/types';

/**
 * Generate a Google Maps walking directions URL.
 * Without an origin, the maps app starts from the device's own position.
 */
export function getDirectionsUrl(destination: Coordinates, origin?: Coordinates): string {
    const params = new URLSearchParams({
        api: '1',
        destination: `${destination.latitude},${destination.longitude}`,
        travelmode: 'walking',
    });
    if (origin) {
        params.set('origin', `${origin.latitude},${origin.longitude}`);
    }
    return `https://www.google.com/maps/dir/?${params.toString()}`;
}
