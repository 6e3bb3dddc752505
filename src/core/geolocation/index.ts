/**
 * Geolocation Module
 * Provides the origin coordinate for finding nearby bus stops
 */

export { GeolocationService } from './service';
export type { LocationResult } from './service';
export { LocationUnavailableError } from './errors';
export {
    ChainedLocationProvider,
    EnvironmentLocationProvider,
    SavedLocationProvider,
    parseCoordinates,
} from './providers';
export type { LocationProvider } from './providers';
