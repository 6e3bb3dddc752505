import { describe, it, expect } from 'vitest';
import { getDirectionsUrl } from './maps-link';

describe('maps-link', () => {
    describe('getDirectionsUrl', () => {
        const destination = { latitude: 38.2466, longitude: 21.7346 };

        it('should build a walking directions URL to the destination', () => {
            expect(getDirectionsUrl(destination)).toBe(
                'https://www.google.com/maps/dir/?api=1&destination=38.2466%2C21.7346&travelmode=walking'
            );
        });

        it('should include the origin when given', () => {
            const url = getDirectionsUrl(destination, { latitude: 38.25, longitude: 21.74 });

            expect(url).toBe(
                'https://www.google.com/maps/dir/?api=1&destination=38.2466%2C21.7346&travelmode=walking&origin=38.25%2C21.74'
            );
        });

        it('should handle negative coordinates', () => {
            const url = getDirectionsUrl({ latitude: -33.8688, longitude: -151.2093 });
            const params = new URL(url).searchParams;

            expect(params.get('destination')).toBe('-33.8688,-151.2093');
        });
    });
});
