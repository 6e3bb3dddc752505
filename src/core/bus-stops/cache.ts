/**
 * File Cache for the Stop Directory
 *
 * The directory is fetched once and then read from disk on every later run.
 * There is no expiry: the files are authoritative until replaced by refresh().
 */

import path from 'node:path';
import type { z } from 'zod';
import { Logger } from '@utils/logger';
import { JsonFileError, readJsonFile, writeJsonFile } from '@utils/json-file';
import { CacheReadError } from './errors';
import type { RawStopPayload, StopNameMap, StopRecord } from '@/types';
import { CoordinatesSchema, StopDirectoryPayloadSchema, StopNameMapSchema } from '@/types';

export const STOPS_FILE = 'stops.json';
export const STOP_NAMES_FILE = 'stop_name.json';

/** Where the directory comes from on a cold cache */
export interface DirectorySource {
    fetchDirectory(): Promise<RawStopPayload[]>;
}

export interface StopDirectoryCacheOptions {
    cacheDir: string;
    source: DirectorySource;
}

/**
 * Accept finite numbers and numeric strings; anything else counts as missing
 */
function toNumber(value: unknown): number | undefined {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
}

/**
 * Convert a payload entry to a StopRecord.
 * Coordinates are kept only when both are present and in range.
 */
export function toStopRecord(entry: RawStopPayload): StopRecord {
    const record: StopRecord = { code: entry.code, name: entry.name };
    const coordinates = CoordinatesSchema.safeParse({
        latitude: toNumber(entry.latitude),
        longitude: toNumber(entry.longitude),
    });
    if (coordinates.success) {
        record.latitude = coordinates.data.latitude;
        record.longitude = coordinates.data.longitude;
    }
    return record;
}

/**
 * Code to name projection.
 * Codes are integer-like keys, so they enumerate (and serialize) in ascending code order.
 */
export function toNameMap(directory: StopRecord[]): StopNameMap {
    const names: StopNameMap = {};
    for (const stop of directory) {
        names[String(stop.code)] = stop.name;
    }
    return names;
}

/**
 * Stop directory cache manager
 */
export class StopDirectoryCache {
    private readonly stopsPath: string;
    private readonly namesPath: string;

    constructor(private readonly options: StopDirectoryCacheOptions) {
        this.stopsPath = path.join(options.cacheDir, STOPS_FILE);
        this.namesPath = path.join(options.cacheDir, STOP_NAMES_FILE);
    }

    /**
     * Get the full directory, fetching and caching it on a cold cache
     * @throws TransitApiError when the cache is cold and the fetch fails
     */
    async getDirectory(): Promise<StopRecord[]> {
        const cached = await this.readCached(this.stopsPath, StopDirectoryPayloadSchema);
        if (cached) {
            Logger.debug('Loaded stop directory from cache', { count: cached.length });
            return cached.map(toStopRecord);
        }

        return this.refresh();
    }

    /**
     * Fetch the directory and write both files over any existing ones.
     * The old files stay in place until the fetch has succeeded.
     * @throws TransitApiError when the fetch fails
     */
    async refresh(): Promise<StopRecord[]> {
        Logger.info('Fetching stop directory from API...');
        const payload = await this.options.source.fetchDirectory();
        const directory = payload.map(toStopRecord);

        await writeJsonFile(this.stopsPath, payload);
        await writeJsonFile(this.namesPath, toNameMap(directory));
        Logger.success('Stop directory cached', { count: directory.length });

        return directory;
    }

    /**
     * Get the code to name map
     * Built from the directory (cached or fetched) when its own file is absent.
     */
    async getNameMap(): Promise<StopNameMap> {
        const cached = await this.readCached(this.namesPath, StopNameMapSchema);
        if (cached) {
            Logger.debug('Loaded stop names from cache', { count: Object.keys(cached).length });
            return cached;
        }

        const names = toNameMap(await this.getDirectory());
        await writeJsonFile(this.namesPath, names);
        return names;
    }

    /**
     * Check whether the full directory is on disk
     */
    async isWarm(): Promise<boolean> {
        try {
            return (await readJsonFile(this.stopsPath, StopDirectoryPayloadSchema)) !== null;
        } catch (error) {
            if (!(error instanceof JsonFileError)) {
                throw error;
            }
            return false;
        }
    }

    /**
     * Read a cache file; an unreadable file is reported and treated as absent
     */
    private async readCached<S extends z.ZodTypeAny>(
        filePath: string,
        schema: S
    ): Promise<z.output<S> | null> {
        try {
            return await readJsonFile(filePath, schema);
        } catch (error) {
            if (!(error instanceof JsonFileError)) {
                throw error;
            }
            const cacheError = new CacheReadError(
                `Ignoring unreadable cache file ${filePath}`,
                filePath,
                error
            );
            Logger.warn(cacheError.getUserMessage(), {
                file: cacheError.filePath,
                reason: error.cause?.message ?? error.message,
            });
            return null;
        }
    }
}
