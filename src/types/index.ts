/**
 * Centralized Type Definitions
 */

import { z } from 'zod';

// --- Location Types ---

/** Geographic coordinates (WGS84) */
export const CoordinatesSchema = z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
});
export type Coordinates = z.infer<typeof CoordinatesSchema>;

/** Location error codes */
export const LocationErrorCode = {
    UNAVAILABLE: 1,
    INVALID_COORDINATES: 2,
} as const;
export type LocationErrorCodeType = (typeof LocationErrorCode)[keyof typeof LocationErrorCode];

// --- Stop Directory Types ---

/** Stop code as sent by the API: an integer, occasionally as an all-digit string */
const StopCodeSchema = z.union([
    z.number().int().nonnegative(),
    z
        .string()
        .regex(/^\d+$/)
        .transform(value => Number(value)),
]);

/**
 * Directory entry as received from the stops endpoint.
 * Only code and name are required; everything else is kept verbatim for the cache file.
 */
export const RawStopPayloadSchema = z
    .object({
        code: StopCodeSchema,
        name: z.string(),
    })
    .passthrough();
export type RawStopPayload = z.infer<typeof RawStopPayloadSchema>;

export const StopDirectoryPayloadSchema = z.array(RawStopPayloadSchema);

/** A stop in the directory. Coordinates are absent when the payload lacks usable ones. */
export interface StopRecord {
    code: number;
    name: string;
    latitude?: number;
    longitude?: number;
}

/** Stop with usable coordinates */
export type LocatedStop = StopRecord & Coordinates;

/** Simplified code to name projection, keyed by the stringified code */
export const StopNameMapSchema = z.record(z.string(), z.string());
export type StopNameMap = z.infer<typeof StopNameMapSchema>;

/** Stop paired with its distance from the search origin */
export interface ProximityResult {
    stop: LocatedStop;
    distanceMeters: number;
}

/** Bus stop error codes */
export const StopErrorCode = {
    CACHE_UNREADABLE: 1,
    INVALID_RADIUS: 3,
} as const;
export type StopErrorCodeType = (typeof StopErrorCode)[keyof typeof StopErrorCode];

// --- Timetable Types ---

/** 1 = Monday ... 7 = Sunday */
export const DayOfWeekSchema = z.number().int().min(1).max(7);

export const StopCodeInputSchema = z.number().int().positive();

/** Scheduled departure from the trips endpoint */
export const TripEntrySchema = z.object({
    tripTime: z.string(),
    routeName: z.string(),
    lineCode: z.union([z.string(), z.number().transform(value => String(value))]),
    stopName: z.string().default('N/A'),
});
export type TripEntry = z.infer<typeof TripEntrySchema>;

export const TripListSchema = z.array(TripEntrySchema);

/** Minutes until a live vehicle departs, when the service knows it */
export type DepartureMinutes = { kind: 'known'; minutes: number } | { kind: 'unknown' };

/** Live arrival estimate from the live endpoint */
export interface LiveVehicle {
    departure: DepartureMinutes;
    routeName: string;
    lineCode: string;
}

export interface LiveResponse {
    vehicles: LiveVehicle[];
}

const RawLiveVehicleSchema = z
    .object({
        departureMins: z.unknown().optional(),
        routeName: z.string().default('N/A'),
        lineCode: z
            .union([z.string(), z.number().transform(value => String(value))])
            .default('N/A'),
    })
    .passthrough();

export const LiveResponseSchema = z
    .object({
        vehicles: z.array(RawLiveVehicleSchema),
    })
    .passthrough();

/** Transit API endpoints, named in errors and logs */
export type Endpoint = 'token' | 'schedule' | 'live' | 'directory';

/** Transit API error codes */
export const TransitErrorCode = {
    CREDENTIAL_FETCH_FAILED: 1,
    TOKEN_NOT_FOUND: 2,
    NETWORK_ERROR: 3,
    HTTP_STATUS: 4,
    INVALID_PAYLOAD: 5,
    INVALID_QUERY: 6,
} as const;
export type TransitErrorCodeType = (typeof TransitErrorCode)[keyof typeof TransitErrorCode];

// --- Departure Board Types ---

/** Scheduled departures for one stop and day */
export interface ScheduleBoard {
    stopCode: number;
    stopName: string;
    day: number;
    trips: TripEntry[];
}

/** Live vehicle with a wall-clock estimate */
export interface LiveArrival extends LiveVehicle {
    /** HH:MM, or null when the minutes are unknown */
    estimatedTime: string | null;
}

export interface LiveBoard {
    stopCode: number;
    stopName: string | null;
    arrivals: LiveArrival[];
}
