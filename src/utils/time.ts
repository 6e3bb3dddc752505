/**
 * Time Utilities
 * Centralized time parsing and formatting functions
 */

import type { DepartureMinutes } from '@/types';

export const DAY_NAMES = [
    'Monday',
    'Tuesday',
    'Wednesday',
    'Thursday',
    'Friday',
    'Saturday',
    'Sunday',
] as const;

/**
 * Day of week as the API numbers it: 1 = Monday ... 7 = Sunday
 */
export function toApiDayOfWeek(date: Date): number {
    const day = date.getDay();
    return day === 0 ? 7 : day;
}

/**
 * English name for an API day number (1 = Monday)
 */
export function dayName(day: number): string {
    return DAY_NAMES[day - 1] ?? `Day ${day}`;
}

/**
 * Format Date as HH:MM string
 * @param date - Date object to format
 * @returns Time string in "HH:MM" format
 */
export function formatTimeHHMM(date: Date): string {
    const hours = date.getHours().toString().padStart(2, '0');
    const minutes = date.getMinutes().toString().padStart(2, '0');
    return `${hours}:${minutes}`;
}

/**
 * Wall-clock time a live vehicle is expected, as HH:MM
 * @returns null when the service gave no minute count
 */
export function estimateArrivalTime(departure: DepartureMinutes, now: Date): string | null {
    if (departure.kind === 'unknown') {
        return null;
    }
    return formatTimeHHMM(new Date(now.getTime() + departure.minutes * 60000));
}
