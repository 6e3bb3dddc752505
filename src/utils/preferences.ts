/**
 * User Preferences
 * Default stop and day, persisted in the data directory
 */

import path from 'node:path';
import { z } from 'zod';
import { Logger } from './logger';
import { JsonFileError, readJsonFile, writeJsonFile } from './json-file';
import { DayOfWeekSchema, StopCodeInputSchema } from '@/types';

export const PREFERENCES_FILE = 'preferences.json';

const PreferencesSchema = z.object({
    stop: StopCodeInputSchema.optional(),
    day: DayOfWeekSchema.optional(),
});
export type Preferences = z.infer<typeof PreferencesSchema>;

/**
 * Get saved preferences
 * An unreadable file is reported and treated as empty
 */
export async function getPreferences(dataDir: string): Promise<Preferences> {
    try {
        return (await readJsonFile(path.join(dataDir, PREFERENCES_FILE), PreferencesSchema)) ?? {};
    } catch (error) {
        if (!(error instanceof JsonFileError)) {
            throw error;
        }
        Logger.warn('Could not read preferences, using defaults', error.message);
        return {};
    }
}

/**
 * Merge and save preferences
 * @returns The saved preferences
 */
export async function savePreferences(
    dataDir: string,
    update: Preferences
): Promise<Preferences> {
    const merged = await getPreferences(dataDir);
    // Fields left undefined keep their saved value
    if (update.stop !== undefined) merged.stop = update.stop;
    if (update.day !== undefined) merged.day = update.day;
    const validated = PreferencesSchema.parse(merged);
    await writeJsonFile(path.join(dataDir, PREFERENCES_FILE), validated);
    Logger.debug('Preferences saved', validated);
    return validated;
}
