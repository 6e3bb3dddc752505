import path from 'node:path';
import { z } from 'zod';
import { Logger } from '@utils/logger';
import { JsonFileError, readJsonFile, removeFile, writeJsonFile } from '@utils/json-file';
import type { Coordinates } from '@/types';
import { CoordinatesSchema } from '@/types';

export const LOCATION_FILE = 'last-location.json';

/** Saved locations older than this are ignored (30 days) */
export const MAX_LOCATION_AGE_MS = 30 * 24 * 60 * 60 * 1000;

const SavedLocationSchema = z.object({
    coordinates: CoordinatesSchema,
    timestamp: z.number(),
});
export type SavedLocation = z.infer<typeof SavedLocationSchema>;

/**
 * Save a location to the data directory
 */
export async function saveLocation(
    dataDir: string,
    coordinates: Coordinates,
    now = Date.now()
): Promise<SavedLocation> {
    const savedLocation: SavedLocation = { coordinates, timestamp: now };
    await writeJsonFile(path.join(dataDir, LOCATION_FILE), savedLocation);
    Logger.debug('Location saved', coordinates);
    return savedLocation;
}

/**
 * Retrieve the saved location
 * Returns null if no location is saved, the file is unreadable, or it is too old (> 30 days)
 */
export async function getSavedLocation(
    dataDir: string,
    now = Date.now()
): Promise<SavedLocation | null> {
    const filePath = path.join(dataDir, LOCATION_FILE);
    try {
        const location = await readJsonFile(filePath, SavedLocationSchema);
        if (!location) {
            return null;
        }

        if (now - location.timestamp > MAX_LOCATION_AGE_MS) {
            Logger.debug('Saved location is too old, ignoring');
            await clearSavedLocation(dataDir);
            return null;
        }

        return location;
    } catch (error) {
        if (!(error instanceof JsonFileError)) {
            throw error;
        }
        Logger.warn('Failed to read saved location', error.message);
        return null;
    }
}

/**
 * Clear the saved location
 */
export async function clearSavedLocation(dataDir: string): Promise<void> {
    await removeFile(path.join(dataDir, LOCATION_FILE));
    Logger.debug('Saved location cleared');
}
