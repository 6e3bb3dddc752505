/**
 * Text Rendering
 * Plain fixed-width tables for the terminal; every function returns the text to print
 */

import { getDirectionsUrl } from '@utils/maps-link';
import { dayName } from '@utils/time';
import type { Bookmark } from '@utils/bookmarks';
import type {
    Coordinates,
    LiveBoard,
    ProximityResult,
    ScheduleBoard,
    StopNameMap,
} from '@/types';

function row(...cells: [string, number][]): string {
    return cells
        .map(([text, width]) => text.padEnd(width))
        .join(' ')
        .trimEnd();
}

/**
 * Format distance for display
 */
export function formatDistance(meters: number): string {
    if (meters >= 1000) {
        return `${(meters / 1000).toFixed(1)}km`;
    }
    return `${Math.round(meters)}m`;
}

/**
 * Scheduled departures: stop name, then time / route / line code
 */
export function renderSchedule(board: ScheduleBoard): string {
    if (board.trips.length === 0) {
        return 'No bus times found.';
    }

    const lines = [
        `${board.stopName} (${board.stopCode}), ${dayName(board.day)}`,
        row(['Time', 6], ['Route', 30], ['Code', 25]),
        '-'.repeat(45),
        ...board.trips.map(trip =>
            row([trip.tripTime, 6], [trip.routeName, 30], [trip.lineCode, 25])
        ),
    ];
    return lines.join('\n');
}

/**
 * Live arrivals: minutes / clock time / route / line code
 */
export function renderLive(board: LiveBoard): string {
    if (board.arrivals.length === 0) {
        return 'No live vehicles found.';
    }

    const header = board.stopName
        ? `${board.stopName} (${board.stopCode}), live`
        : `Stop ${board.stopCode}, live`;

    const lines = [
        header,
        row(['Mins', 5], ['Time', 6], ['Route', 30], ['Line', 25]),
        '-'.repeat(50),
        ...board.arrivals.map(arrival =>
            row(
                [arrival.departure.kind === 'known' ? String(arrival.departure.minutes) : 'N/A', 5],
                [arrival.estimatedTime ?? 'N/A', 6],
                [arrival.routeName, 30],
                [arrival.lineCode, 25]
            )
        ),
    ];
    return lines.join('\n');
}

/**
 * Code to name map as pretty JSON, non-ASCII kept as-is
 */
export function renderNames(names: StopNameMap): string {
    return JSON.stringify(names, null, 2);
}

/**
 * Nearby stops, nearest first, with walking directions links
 */
export function renderNearby(
    results: ProximityResult[],
    origin: Coordinates,
    radius: number,
    bookmarked: ReadonlySet<number> = new Set()
): string {
    const heading = `Stops within ${formatDistance(radius)} of ${origin.latitude.toFixed(5)}, ${origin.longitude.toFixed(5)}`;
    if (results.length === 0) {
        return `${heading}\nNo stops found. Try a larger --radius.`;
    }

    const lines = [
        heading,
        row(['Dist', 7], ['Code', 6], ['Name', 30]),
        '-'.repeat(45),
        ...results.map(({ stop, distanceMeters }) =>
            row(
                [formatDistance(distanceMeters), 7],
                [String(stop.code), 6],
                [`${bookmarked.has(stop.code) ? '* ' : ''}${stop.name}`, 30]
            )
        ),
    ];

    const nearest = results[0];
    if (nearest) {
        lines.push('', `Directions to ${nearest.stop.name}: ${getDirectionsUrl(nearest.stop, origin)}`);
    }
    return lines.join('\n');
}

/**
 * Bookmarked stops with their names where known
 */
export function renderBookmarks(bookmarks: Bookmark[], names: StopNameMap): string {
    if (bookmarks.length === 0) {
        return 'No bookmarked stops. Add one with --bookmark --stop <code>.';
    }
    return [
        row(['Code', 6], ['Name', 30]),
        '-'.repeat(37),
        ...bookmarks.map(b => row([String(b.code), 6], [names[String(b.code)] ?? '?', 30])),
    ].join('\n');
}
