/**
 * Core Module
 * Core application logic, wired from configuration
 */

import path from 'node:path';
import { PageTokenResolver, TransitApiClient } from '@api/index';
import type { CredentialResolver } from '@api/index';
import type { AppConfig } from '@config/index';
import { BusStopService, StopDirectoryCache } from './bus-stops';
import { DepartureService } from './departures';
import {
    ChainedLocationProvider,
    EnvironmentLocationProvider,
    GeolocationService,
    SavedLocationProvider,
} from './geolocation';
import type { LocationProvider } from './geolocation';

export { BusStopService, StopDirectoryCache, BusStopError, CacheReadError } from './bus-stops';
export { DepartureService } from './departures';
export { GeolocationService, LocationUnavailableError } from './geolocation';

export interface CoreServices {
    client: TransitApiClient;
    cache: StopDirectoryCache;
    stops: BusStopService;
    departures: DepartureService;
    geolocation: GeolocationService;
}

/** Collaborators that tests (or other front-ends) may replace */
export interface CoreOverrides {
    credentials?: CredentialResolver;
    locationProvider?: LocationProvider;
    env?: NodeJS.ProcessEnv;
}

/**
 * Build the services for one process from configuration
 */
export function createCoreServices(config: AppConfig, overrides: CoreOverrides = {}): CoreServices {
    const { citybus, api, storage } = config;
    const profile = { webOrigin: citybus.webOrigin, userAgent: citybus.userAgent };

    const credentials =
        overrides.credentials ??
        new PageTokenResolver({ ...profile, pageUrl: citybus.tokenPageUrl, timeout: api.timeout });

    const client = new TransitApiClient({
        ...profile,
        baseUrl: citybus.apiBaseUrl,
        timeout: api.timeout,
        credentials,
    });

    const cache = new StopDirectoryCache({
        cacheDir: path.resolve(storage.dataDir),
        source: client,
    });

    const geolocation = new GeolocationService(
        overrides.locationProvider ??
            new ChainedLocationProvider([
                new EnvironmentLocationProvider(overrides.env),
                new SavedLocationProvider(storage.dataDir),
            ])
    );

    const stops = new BusStopService({ cache, geolocation });
    const departures = new DepartureService({ client, stops });

    return { client, cache, stops, departures, geolocation };
}
