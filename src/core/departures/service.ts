/**
 * Departure Service
 * Scheduled and live departures for a single stop
 */

import { Logger } from '@utils/logger';
import { estimateArrivalTime } from '@utils/time';
import type { TransitApiClient } from '@api/citybus';
import type { BusStopService } from '@core/bus-stops';
import type { LiveBoard, ScheduleBoard } from '@/types';

/** Result type for a schedule fetch */
export type ScheduleResult =
    | { success: true; board: ScheduleBoard }
    | { success: false; error: Error };

/** Result type for a live fetch */
export type LiveResult = { success: true; board: LiveBoard } | { success: false; error: Error };

export interface DepartureServiceOptions {
    client: Pick<TransitApiClient, 'fetchSchedule' | 'fetchLive'>;
    stops: Pick<BusStopService, 'getCachedStopName'>;
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Departure Service - one credential resolution and one API call per request
 */
export class DepartureService {
    constructor(private readonly options: DepartureServiceOptions) {}

    /**
     * Scheduled departures for a stop on a day (1 = Monday ... 7 = Sunday)
     */
    async getSchedule(stopCode: number, day: number): Promise<ScheduleResult> {
        try {
            const trips = await this.options.client.fetchSchedule(stopCode, day);
            const reported = trips.find(trip => trip.stopName !== 'N/A')?.stopName;
            const stopName =
                reported ??
                (await this.options.stops.getCachedStopName(stopCode)) ??
                `Stop ${stopCode}`;

            return { success: true, board: { stopCode, stopName, day, trips } };
        } catch (error) {
            const failure = toError(error);
            Logger.warn('Failed to get schedule', { stopCode, day, message: failure.message });
            return { success: false, error: failure };
        }
    }

    /**
     * Live arrivals for a stop, with the wall-clock time each is expected
     */
    async getLive(stopCode: number, now: Date = new Date()): Promise<LiveResult> {
        try {
            const { vehicles } = await this.options.client.fetchLive(stopCode);
            const stopName = await this.options.stops.getCachedStopName(stopCode);

            return {
                success: true,
                board: {
                    stopCode,
                    stopName,
                    arrivals: vehicles.map(vehicle => ({
                        ...vehicle,
                        estimatedTime: estimateArrivalTime(vehicle.departure, now),
                    })),
                },
            };
        } catch (error) {
            const failure = toError(error);
            Logger.warn('Failed to get live departures', { stopCode, message: failure.message });
            return { success: false, error: failure };
        }
    }
}
