/**
 * Command-line argument parsing
 */

import { parseArgs } from 'node:util';
import { parseCoordinates } from '@core/geolocation';
import { toApiDayOfWeek } from '@utils/time';
import type { Coordinates } from '@/types';
import { DayOfWeekSchema, StopCodeInputSchema } from '@/types';

/** Command selected by the flags */
export type Command =
    | { kind: 'help' }
    | { kind: 'schedule'; stop?: number; day?: number }
    | { kind: 'live'; stop?: number }
    | { kind: 'names'; query?: string }
    | { kind: 'nearby'; radius?: number; origin?: Coordinates }
    | { kind: 'save-location'; origin: Coordinates }
    | { kind: 'set-default'; stop?: number; day?: number }
    | { kind: 'bookmark'; stop?: number }
    | { kind: 'unbookmark'; stop?: number }
    | { kind: 'bookmarks' }
    | { kind: 'refresh-stops' };

export interface ParsedArgs {
    command: Command;
    debug: boolean;
}

/** Invalid or conflicting flags */
export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

export const USAGE = `Usage: citybus [options]

Get Patras CityBus times for a stop and day.

Options:
  --stop <code>         Stop code (default: saved default, else config)
  --day <1-7|today>     Day of week, 1=Monday ... 7=Sunday (default: saved default, else config)
  --live                Show live bus times instead of scheduled
  --names [query]       Print the stop code-to-name map, filtered by substring if given
  --nearby              List stops near a location, nearest first
  --radius <meters>     Search radius for --nearby
  --lat <deg>           Latitude for --nearby or --save-location
  --lon <deg>           Longitude for --nearby or --save-location
  --save-location       Remember --lat/--lon for later --nearby searches
  --set-default         Save --stop and/or --day as defaults
  --bookmark            Bookmark --stop
  --unbookmark          Remove the bookmark for --stop
  --bookmarks           List bookmarked stops
  --refresh-stops       Delete the cached stop directory and fetch it again
  --debug               Verbose logging to stderr
  -h, --help            Show this help

Notes:
  Live times require internet access.
  The stop directory is cached after the first fetch; use --refresh-stops to update it.`;

function parseStop(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const result = StopCodeInputSchema.safeParse(Number(value));
    if (!/^\d+$/.test(value.trim()) || !result.success) {
        throw new UsageError(`Invalid stop code: ${value}`);
    }
    return result.data;
}

function parseDay(value: string | undefined, now: Date): number | undefined {
    if (value === undefined) return undefined;
    if (value.trim().toLowerCase() === 'today') {
        return toApiDayOfWeek(now);
    }
    const result = DayOfWeekSchema.safeParse(Number(value));
    if (!/^\d+$/.test(value.trim()) || !result.success) {
        throw new UsageError(`Invalid day: ${value} (expected 1-7 or "today")`);
    }
    return result.data;
}

function parseRadius(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const radius = Number(value);
    if (value.trim() === '' || !Number.isFinite(radius) || radius < 0) {
        throw new UsageError(`Invalid radius: ${value}`);
    }
    return radius;
}

function parseOrigin(lat: string | undefined, lon: string | undefined): Coordinates | undefined {
    if (lat === undefined && lon === undefined) return undefined;
    if (lat === undefined || lon === undefined) {
        throw new UsageError('--lat and --lon must be given together');
    }
    const origin = parseCoordinates(lat, lon);
    if (!origin) {
        throw new UsageError(`Invalid coordinates: ${lat}, ${lon}`);
    }
    return origin;
}

function readFlags(argv: string[]) {
    return parseArgs({
        args: argv,
        allowPositionals: true,
        strict: true,
        options: {
            stop: { type: 'string' },
            day: { type: 'string' },
            live: { type: 'boolean', default: false },
            names: { type: 'boolean', default: false },
            nearby: { type: 'boolean', default: false },
            radius: { type: 'string' },
            lat: { type: 'string' },
            lon: { type: 'string' },
            'save-location': { type: 'boolean', default: false },
            'set-default': { type: 'boolean', default: false },
            bookmark: { type: 'boolean', default: false },
            unbookmark: { type: 'boolean', default: false },
            bookmarks: { type: 'boolean', default: false },
            'refresh-stops': { type: 'boolean', default: false },
            debug: { type: 'boolean', default: false },
            help: { type: 'boolean', short: 'h', default: false },
        },
    });
}

/**
 * Parse argv (without the node and script entries) into a command
 * @throws UsageError on unknown flags or invalid values
 */
export function parseCommandLine(argv: string[], now: Date = new Date()): ParsedArgs {
    let parsed: ReturnType<typeof readFlags>;
    try {
        parsed = readFlags(argv);
    } catch (error) {
        throw new UsageError(error instanceof Error ? error.message : String(error));
    }

    const { values, positionals } = parsed;
    const debug = values.debug === true;

    const modes = [
        'live',
        'names',
        'nearby',
        'save-location',
        'set-default',
        'bookmark',
        'unbookmark',
        'bookmarks',
        'refresh-stops',
    ] as const;
    const selected = modes.filter(mode => values[mode] === true);
    if (selected.length > 1) {
        throw new UsageError(`Choose one of --${selected.join(', --')}`);
    }

    if (positionals.length > 0 && !values.names) {
        throw new UsageError(`Unexpected argument: ${positionals[0]}`);
    }

    if (values.help) {
        return { command: { kind: 'help' }, debug };
    }

    const stop = parseStop(values.stop);
    const day = parseDay(values.day, now);
    const origin = parseOrigin(values.lat, values.lon);
    const radius = parseRadius(values.radius);

    const mode = selected[0];
    switch (mode) {
        case 'live':
            return { command: { kind: 'live', stop }, debug };
        case 'names': {
            const query = positionals.join(' ').trim();
            return { command: { kind: 'names', query: query || undefined }, debug };
        }
        case 'nearby':
            return { command: { kind: 'nearby', radius, origin }, debug };
        case 'save-location':
            if (!origin) {
                throw new UsageError('--save-location needs --lat and --lon');
            }
            return { command: { kind: 'save-location', origin }, debug };
        case 'set-default':
            if (stop === undefined && day === undefined) {
                throw new UsageError('--set-default needs --stop and/or --day');
            }
            return { command: { kind: 'set-default', stop, day }, debug };
        case 'bookmark':
            return { command: { kind: 'bookmark', stop }, debug };
        case 'unbookmark':
            return { command: { kind: 'unbookmark', stop }, debug };
        case 'bookmarks':
            return { command: { kind: 'bookmarks' }, debug };
        case 'refresh-stops':
            return { command: { kind: 'refresh-stops' }, debug };
        default:
            return { command: { kind: 'schedule', stop, day }, debug };
    }
}
