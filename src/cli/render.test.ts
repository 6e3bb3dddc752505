import { describe, it, expect } from 'vitest';
import {
    formatDistance,
    renderBookmarks,
    renderLive,
    renderNames,
    renderNearby,
    renderSchedule,
} from './render';

describe('formatDistance', () => {
    it('should show meters below one kilometre', () => {
        expect(formatDistance(0)).toBe('0m');
        expect(formatDistance(387.6)).toBe('388m');
    });

    it('should show kilometres with one decimal from 1000m', () => {
        expect(formatDistance(1000)).toBe('1.0km');
        expect(formatDistance(2400)).toBe('2.4km');
    });
});

describe('renderSchedule', () => {
    it('should print a header, column titles and one line per trip', () => {
        const text = renderSchedule({
            stopCode: 214,
            stopName: 'Αγορά',
            day: 5,
            trips: [{ tripTime: '07:15', routeName: 'Line A', lineCode: '6', stopName: 'Αγορά' }],
        });

        expect(text.split('\n')).toEqual([
            'Αγορά (214), Friday',
            `Time   ${'Route'.padEnd(30)} Code`,
            '-'.repeat(45),
            `07:15  ${'Line A'.padEnd(30)} 6`,
        ]);
    });

    it('should say so when there are no trips', () => {
        expect(renderSchedule({ stopCode: 214, stopName: 'Αγορά', day: 5, trips: [] })).toBe(
            'No bus times found.'
        );
    });
});

describe('renderLive', () => {
    it('should print known and unknown arrivals', () => {
        const text = renderLive({
            stopCode: 214,
            stopName: null,
            arrivals: [
                {
                    departure: { kind: 'known', minutes: 5 },
                    routeName: 'Line A',
                    lineCode: '2',
                    estimatedTime: '10:03',
                },
                {
                    departure: { kind: 'unknown' },
                    routeName: 'Line B',
                    lineCode: '9',
                    estimatedTime: null,
                },
            ],
        });

        expect(text.split('\n')).toEqual([
            'Stop 214, live',
            `Mins  Time   ${'Route'.padEnd(30)} Line`,
            '-'.repeat(50),
            `5     10:03  ${'Line A'.padEnd(30)} 2`,
            `N/A   N/A    ${'Line B'.padEnd(30)} 9`,
        ]);
    });

    it('should name the stop when known', () => {
        const text = renderLive({
            stopCode: 214,
            stopName: 'Αγορά',
            arrivals: [
                {
                    departure: { kind: 'known', minutes: 1 },
                    routeName: 'Line A',
                    lineCode: '2',
                    estimatedTime: '10:00',
                },
            ],
        });

        expect(text.split('\n')[0]).toBe('Αγορά (214), live');
    });

    it('should say so when no vehicles are reported', () => {
        expect(renderLive({ stopCode: 214, stopName: null, arrivals: [] })).toBe(
            'No live vehicles found.'
        );
    });
});

describe('renderNames', () => {
    it('should print pretty JSON with names unescaped', () => {
        expect(renderNames({ '214': 'Αγορά' })).toBe('{\n  "214": "Αγορά"\n}');
    });
});

describe('renderNearby', () => {
    const origin = { latitude: 38.2466, longitude: 21.7346 };
    const stop = { code: 214, name: 'Αγορά', latitude: 38.2466, longitude: 21.7346 };

    it('should list stops, mark bookmarks and link directions to the nearest', () => {
        const text = renderNearby([{ stop, distanceMeters: 0 }], origin, 500, new Set([214]));

        expect(text.split('\n')).toEqual([
            'Stops within 500m of 38.24660, 21.73460',
            'Dist    Code   Name',
            '-'.repeat(45),
            '0m      214    * Αγορά',
            '',
            'Directions to Αγορά: https://www.google.com/maps/dir/?api=1&destination=38.2466%2C21.7346&travelmode=walking&origin=38.2466%2C21.7346',
        ]);
    });

    it('should suggest a larger radius when nothing is found', () => {
        expect(renderNearby([], origin, 1500)).toBe(
            'Stops within 1.5km of 38.24660, 21.73460\nNo stops found. Try a larger --radius.'
        );
    });
});

describe('renderBookmarks', () => {
    it('should list bookmarks with names, or ? when unknown', () => {
        const text = renderBookmarks(
            [
                { code: 214, addedAt: 1 },
                { code: 9, addedAt: 2 },
            ],
            { '214': 'Αγορά' }
        );

        expect(text.split('\n')).toEqual([
            'Code   Name',
            '-'.repeat(37),
            '214    Αγορά',
            '9      ?',
        ]);
    });

    it('should explain how to add one when empty', () => {
        expect(renderBookmarks([], {})).toBe(
            'No bookmarked stops. Add one with --bookmark --stop <code>.'
        );
    });
});
