import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { BOOKMARKS_FILE, BookmarksManager } from './bookmarks';
import { Logger } from './logger';

describe('BookmarksManager', () => {
    let dataDir: string;
    let clock: number;
    let manager: BookmarksManager;

    beforeEach(async () => {
        dataDir = await mkdtemp(path.join(os.tmpdir(), 'citybus-bookmarks-'));
        clock = 1000;
        manager = new BookmarksManager(dataDir, () => clock++);
        Logger.setLevel('ERROR');
    });

    afterEach(async () => {
        await rm(dataDir, { recursive: true, force: true });
        Logger.setLevel('INFO');
    });

    it('should start empty when no file exists', async () => {
        expect(await manager.getAll()).toEqual([]);
    });

    it('should add bookmarks in order', async () => {
        await manager.add(214);
        await manager.add(300);

        expect(await manager.getAll()).toEqual([
            { code: 214, addedAt: 1000 },
            { code: 300, addedAt: 1001 },
        ]);
        expect(await manager.getCodes()).toEqual(new Set([214, 300]));
    });

    it('should move an existing bookmark to the end when re-added', async () => {
        await manager.add(214);
        await manager.add(300);
        await manager.add(214);

        expect((await manager.getAll()).map(b => b.code)).toEqual([300, 214]);
    });

    it('should report whether a removal happened', async () => {
        await manager.add(214);

        expect(await manager.remove(214)).toBe(true);
        expect(await manager.remove(214)).toBe(false);
        expect(await manager.getAll()).toEqual([]);
    });

    it('should persist to bookmarks.json', async () => {
        await manager.add(214);

        const text = await readFile(path.join(dataDir, BOOKMARKS_FILE), 'utf-8');
        expect(JSON.parse(text)).toEqual([{ code: 214, addedAt: 1000 }]);
    });

    it('should treat a corrupt file as empty', async () => {
        await writeFile(path.join(dataDir, BOOKMARKS_FILE), '{not json', 'utf-8');

        expect(await manager.getAll()).toEqual([]);
    });
});
