/**
 * CityBus REST API Client
 * Scheduled trips, live vehicles and the stop directory for one city
 */

import { Logger } from '@utils/logger';
import { getJson, makeBrowserHeaders } from './http';
import { InvalidQueryError, PayloadError } from './errors';
import type { BrowserProfile, GetOptions } from './http';
import type { CredentialResolver } from './credentials';
import type { DepartureMinutes, Endpoint, LiveResponse, RawStopPayload, TripEntry } from '@/types';
import {
    DayOfWeekSchema,
    LiveResponseSchema,
    StopCodeInputSchema,
    StopDirectoryPayloadSchema,
    TripListSchema,
} from '@/types';

export interface TransitApiClientOptions extends BrowserProfile {
    /** e.g. https://rest.citybus.gr/api/v1/el/112 */
    baseUrl: string;
    timeout: number;
    credentials: CredentialResolver;
}

/**
 * Read departureMins as sent by the live endpoint.
 * Integers and all-digit strings are known; anything else ("N/A", null, missing) is not.
 */
export function toDepartureMinutes(value: unknown): DepartureMinutes {
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
        return { kind: 'known', minutes: value };
    }
    if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
        return { kind: 'known', minutes: parseInt(value, 10) };
    }
    return { kind: 'unknown' };
}

export class TransitApiClient {
    private readonly baseUrl: string;

    constructor(private readonly options: TransitApiClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    }

    /**
     * Fetch scheduled departures for a stop on a day of the week
     * @param dayOfWeek - 1 = Monday ... 7 = Sunday
     * @throws HttpStatusError with tokenExpired set on a 401
     */
    async fetchSchedule(stopCode: number, dayOfWeek: number): Promise<TripEntry[]> {
        assertStopCode(stopCode, 'schedule');
        if (!DayOfWeekSchema.safeParse(dayOfWeek).success) {
            throw new InvalidQueryError(
                `Day must be between 1 (Monday) and 7 (Sunday), got ${dayOfWeek}`,
                'schedule'
            );
        }

        const url = `${this.baseUrl}/trips/stop/${stopCode}/day/${dayOfWeek}`;
        const body = await this.authorizedGet(url, 'schedule', true);

        const validated = TripListSchema.safeParse(body);
        if (!validated.success) {
            Logger.error('Invalid schedule response', validated.error.issues);
            throw new PayloadError('Unexpected schedule response', 'schedule', validated.error);
        }

        Logger.debug('Fetched schedule', { stopCode, dayOfWeek, count: validated.data.length });
        return validated.data;
    }

    /**
     * Fetch live arrival estimates for a stop
     */
    async fetchLive(stopCode: number): Promise<LiveResponse> {
        assertStopCode(stopCode, 'live');

        const url = `${this.baseUrl}/stops/live/${stopCode}`;
        const body = await this.authorizedGet(url, 'live', false);

        const validated = LiveResponseSchema.safeParse(body);
        if (!validated.success) {
            Logger.error('Invalid live response', validated.error.issues);
            throw new PayloadError('Unexpected live response', 'live', validated.error);
        }

        const vehicles = validated.data.vehicles.map(vehicle => ({
            departure: toDepartureMinutes(vehicle.departureMins),
            routeName: vehicle.routeName,
            lineCode: vehicle.lineCode,
        }));

        Logger.debug('Fetched live vehicles', { stopCode, count: vehicles.length });
        return { vehicles };
    }

    /**
     * Fetch the full stop directory
     * Entries keep every field the service sends, so they can be cached as received.
     */
    async fetchDirectory(): Promise<RawStopPayload[]> {
        const body = await this.authorizedGet(`${this.baseUrl}/stops`, 'directory', false);

        const validated = StopDirectoryPayloadSchema.safeParse(body);
        if (!validated.success) {
            Logger.error('Invalid stop directory response', validated.error.issues);
            throw new PayloadError(
                'Unexpected stop directory response',
                'directory',
                validated.error
            );
        }

        Logger.info('Fetched stop directory', { count: validated.data.length });
        return validated.data;
    }

    private async authorizedGet(
        url: string,
        endpoint: Endpoint,
        flagUnauthorized: boolean
    ): Promise<unknown> {
        const token = await this.options.credentials.resolveToken();

        const options: GetOptions = {
            endpoint,
            timeout: this.options.timeout,
            flagUnauthorized,
            headers: {
                ...makeBrowserHeaders(this.options),
                Authorization: `Bearer ${token}`,
            },
        };
        return getJson(url, options);
    }
}

function assertStopCode(stopCode: number, endpoint: Endpoint): void {
    if (!StopCodeInputSchema.safeParse(stopCode).success) {
        throw new InvalidQueryError(
            `Stop code must be a positive integer, got ${stopCode}`,
            endpoint
        );
    }
}
