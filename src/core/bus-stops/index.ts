/**
 * Bus Stops Module
 */

export { BusStopService } from './service';
export type { NearbyStopsResult, BusStopServiceOptions } from './service';
export { StopDirectoryCache, toStopRecord, toNameMap, STOPS_FILE, STOP_NAMES_FILE } from './cache';
export type { DirectorySource, StopDirectoryCacheOptions } from './cache';
export { haversineDistance, findStopsWithin, hasCoordinates, EARTH_RADIUS_METERS } from './proximity';
export { BusStopError, CacheReadError } from './errors';
