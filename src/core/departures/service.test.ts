import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DepartureService } from './service';
import { HttpStatusError } from '@api/errors';
import { Logger } from '@utils/logger';
import type { LiveResponse, TripEntry } from '@/types';

describe('DepartureService', () => {
    let fetchSchedule: ReturnType<typeof vi.fn>;
    let fetchLive: ReturnType<typeof vi.fn>;
    let getCachedStopName: ReturnType<typeof vi.fn>;
    let service: DepartureService;

    beforeEach(() => {
        fetchSchedule = vi.fn(async (): Promise<TripEntry[]> => []);
        fetchLive = vi.fn(async (): Promise<LiveResponse> => ({ vehicles: [] }));
        getCachedStopName = vi.fn(async (): Promise<string | null> => null);
        service = new DepartureService({
            client: { fetchSchedule, fetchLive },
            stops: { getCachedStopName },
        });
        Logger.setLevel('ERROR');
    });

    afterEach(() => {
        Logger.setLevel('INFO');
    });

    describe('getSchedule', () => {
        it('should take the stop name from the trips', async () => {
            fetchSchedule.mockResolvedValue([
                { tripTime: '07:15', routeName: 'Line A', lineCode: '6', stopName: 'Αγορά' },
            ]);

            const result = await service.getSchedule(214, 5);

            expect(fetchSchedule).toHaveBeenCalledWith(214, 5);
            expect(result).toEqual({
                success: true,
                board: {
                    stopCode: 214,
                    stopName: 'Αγορά',
                    day: 5,
                    trips: [
                        { tripTime: '07:15', routeName: 'Line A', lineCode: '6', stopName: 'Αγορά' },
                    ],
                },
            });
            expect(getCachedStopName).not.toHaveBeenCalled();
        });

        it('should fall back to the cached name, then the code', async () => {
            fetchSchedule.mockResolvedValue([
                { tripTime: '07:15', routeName: 'Line A', lineCode: '6', stopName: 'N/A' },
            ]);
            getCachedStopName.mockResolvedValueOnce('Σταθμός');

            const cached = await service.getSchedule(300, 1);
            const uncached = await service.getSchedule(300, 1);

            expect(cached.success && cached.board.stopName).toBe('Σταθμός');
            expect(uncached.success && uncached.board.stopName).toBe('Stop 300');
        });

        it('should return the error on failure', async () => {
            const failure = new HttpStatusError(401, 'schedule', true);
            fetchSchedule.mockRejectedValue(failure);

            const result = await service.getSchedule(214, 5);

            expect(result).toEqual({ success: false, error: failure });
        });
    });

    describe('getLive', () => {
        it('should add estimated clock times to each vehicle', async () => {
            fetchLive.mockResolvedValue({
                vehicles: [
                    { departure: { kind: 'known', minutes: 5 }, routeName: 'Line A', lineCode: '2' },
                    { departure: { kind: 'unknown' }, routeName: 'Line B', lineCode: '9' },
                ],
            });
            getCachedStopName.mockResolvedValue('Αγορά');

            const result = await service.getLive(214, new Date(2024, 0, 1, 9, 58));

            expect(result).toEqual({
                success: true,
                board: {
                    stopCode: 214,
                    stopName: 'Αγορά',
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
                },
            });
        });

        it('should return the error on failure', async () => {
            fetchLive.mockRejectedValue(new Error('offline'));

            const result = await service.getLive(214);

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.message).toBe('offline');
            }
        });
    });
});
