/**
 * Bookmarks Manager
 * Handles file persistence for bookmarked bus stops
 */

import path from 'node:path';
import { z } from 'zod';
import { Logger } from './logger';
import { JsonFileError, readJsonFile, writeJsonFile } from './json-file';

export const BOOKMARKS_FILE = 'bookmarks.json';

const BookmarkSchema = z.object({
    code: z.number().int().positive(),
    addedAt: z.number(),
});
export type Bookmark = z.infer<typeof BookmarkSchema>;

const BookmarkListSchema = z.array(BookmarkSchema);

/**
 * Manages bookmarked stops in the data directory
 */
export class BookmarksManager {
    private readonly filePath: string;

    constructor(
        dataDir: string,
        private readonly now: () => number = Date.now
    ) {
        this.filePath = path.join(dataDir, BOOKMARKS_FILE);
    }

    /**
     * Get all bookmarks, oldest first
     */
    async getAll(): Promise<Bookmark[]> {
        try {
            return (await readJsonFile(this.filePath, BookmarkListSchema)) ?? [];
        } catch (error) {
            if (!(error instanceof JsonFileError)) {
                throw error;
            }
            Logger.warn('Could not read bookmarks', error.message);
            return [];
        }
    }

    /**
     * Get set of bookmarked codes for fast lookup
     */
    async getCodes(): Promise<Set<number>> {
        return new Set((await this.getAll()).map(b => b.code));
    }

    /**
     * Add a stop to bookmarks (moves it to the end if already present)
     */
    async add(code: number): Promise<void> {
        const bookmarks = (await this.getAll()).filter(b => b.code !== code);
        bookmarks.push({ code, addedAt: this.now() });
        await writeJsonFile(this.filePath, bookmarks);
    }

    /**
     * Remove a stop from bookmarks
     * @returns true if the stop was bookmarked
     */
    async remove(code: number): Promise<boolean> {
        const bookmarks = await this.getAll();
        const remaining = bookmarks.filter(b => b.code !== code);
        if (remaining.length === bookmarks.length) {
            return false;
        }
        await writeJsonFile(this.filePath, remaining);
        return true;
    }
}
