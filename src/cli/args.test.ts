import { describe, it, expect } from 'vitest';
import { UsageError, parseCommandLine } from './args';

describe('parseCommandLine', () => {
    const sunday = new Date(2024, 0, 7, 12, 0);

    it('should default to the schedule for the saved or configured stop', () => {
        expect(parseCommandLine([])).toEqual({
            command: { kind: 'schedule', stop: undefined, day: undefined },
            debug: false,
        });
    });

    it('should read --stop and --day', () => {
        expect(parseCommandLine(['--stop', '300', '--day', '2']).command).toEqual({
            kind: 'schedule',
            stop: 300,
            day: 2,
        });
    });

    it('should turn --day today into the current API day', () => {
        expect(parseCommandLine(['--day', 'today'], sunday).command).toEqual({
            kind: 'schedule',
            stop: undefined,
            day: 7,
        });
    });

    it('should select live mode', () => {
        expect(parseCommandLine(['--live', '--stop', '214']).command).toEqual({
            kind: 'live',
            stop: 214,
        });
    });

    it('should take a --names query from the positionals', () => {
        expect(parseCommandLine(['--names', 'Αγορά']).command).toEqual({
            kind: 'names',
            query: 'Αγορά',
        });
        expect(parseCommandLine(['--names']).command).toEqual({ kind: 'names', query: undefined });
    });

    it('should read --nearby with an origin and radius', () => {
        expect(
            parseCommandLine(['--nearby', '--lat', '38.25', '--lon', '21.73', '--radius', '300'])
                .command
        ).toEqual({
            kind: 'nearby',
            radius: 300,
            origin: { latitude: 38.25, longitude: 21.73 },
        });
    });

    it('should accept negative coordinates in --flag=value form', () => {
        expect(parseCommandLine(['--nearby', '--lat=-33.86', '--lon=151.2']).command).toEqual({
            kind: 'nearby',
            radius: undefined,
            origin: { latitude: -33.86, longitude: 151.2 },
        });
    });

    it('should read save-location, set-default and bookmark commands', () => {
        expect(parseCommandLine(['--save-location', '--lat', '38', '--lon', '21']).command).toEqual({
            kind: 'save-location',
            origin: { latitude: 38, longitude: 21 },
        });
        expect(parseCommandLine(['--set-default', '--day', '3']).command).toEqual({
            kind: 'set-default',
            stop: undefined,
            day: 3,
        });
        expect(parseCommandLine(['--bookmark', '--stop', '214']).command).toEqual({
            kind: 'bookmark',
            stop: 214,
        });
        expect(parseCommandLine(['--bookmarks']).command).toEqual({ kind: 'bookmarks' });
        expect(parseCommandLine(['--refresh-stops']).command).toEqual({ kind: 'refresh-stops' });
    });

    it('should set the debug flag', () => {
        expect(parseCommandLine(['--debug']).debug).toBe(true);
    });

    it('should show help before validating other flags', () => {
        expect(parseCommandLine(['-h', '--stop', 'abc']).command).toEqual({ kind: 'help' });
    });

    describe('errors', () => {
        it('should reject more than one mode', () => {
            expect(() => parseCommandLine(['--live', '--names'])).toThrow(
                new UsageError('Choose one of --live, --names')
            );
        });

        it('should reject unknown flags', () => {
            expect(() => parseCommandLine(['--bogus'])).toThrow(UsageError);
        });

        it('should reject a positional argument outside --names', () => {
            expect(() => parseCommandLine(['214'])).toThrow('Unexpected argument: 214');
        });

        it('should reject invalid stop codes', () => {
            expect(() => parseCommandLine(['--stop', 'abc'])).toThrow('Invalid stop code: abc');
            expect(() => parseCommandLine(['--stop', '0'])).toThrow('Invalid stop code: 0');
        });

        it('should reject days outside 1-7', () => {
            expect(() => parseCommandLine(['--day', '8'])).toThrow(
                'Invalid day: 8 (expected 1-7 or "today")'
            );
        });

        it('should reject a negative radius', () => {
            expect(() => parseCommandLine(['--nearby', '--radius=-5'])).toThrow(
                'Invalid radius: -5'
            );
        });

        it('should require --lat and --lon together', () => {
            expect(() => parseCommandLine(['--nearby', '--lat', '38'])).toThrow(
                '--lat and --lon must be given together'
            );
        });

        it('should reject out-of-range coordinates', () => {
            expect(() => parseCommandLine(['--nearby', '--lat', '91', '--lon', '21'])).toThrow(
                'Invalid coordinates: 91, 21'
            );
        });

        it('should require an origin for --save-location', () => {
            expect(() => parseCommandLine(['--save-location'])).toThrow(
                '--save-location needs --lat and --lon'
            );
        });

        it('should require a stop or day for --set-default', () => {
            expect(() => parseCommandLine(['--set-default'])).toThrow(
                '--set-default needs --stop and/or --day'
            );
        });
    });
});
