import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { PREFERENCES_FILE, getPreferences, savePreferences } from './preferences';
import { Logger } from './logger';

describe('preferences', () => {
    let dataDir: string;

    beforeEach(async () => {
        dataDir = await mkdtemp(path.join(os.tmpdir(), 'citybus-prefs-'));
        Logger.setLevel('ERROR');
    });

    afterEach(async () => {
        await rm(dataDir, { recursive: true, force: true });
        Logger.setLevel('INFO');
    });

    it('should return empty preferences when nothing is saved', async () => {
        expect(await getPreferences(dataDir)).toEqual({});
    });

    it('should save and read back a default stop and day', async () => {
        await savePreferences(dataDir, { stop: 300, day: 2 });

        expect(await getPreferences(dataDir)).toEqual({ stop: 300, day: 2 });
    });

    it('should keep saved fields the update leaves out', async () => {
        await savePreferences(dataDir, { stop: 300, day: 2 });
        const saved = await savePreferences(dataDir, { day: 6 });

        expect(saved).toEqual({ stop: 300, day: 6 });
        expect(await getPreferences(dataDir)).toEqual({ stop: 300, day: 6 });
    });

    it('should reject an out-of-range day', async () => {
        await expect(savePreferences(dataDir, { day: 8 })).rejects.toThrow();
    });

    it('should ignore a file with the wrong shape', async () => {
        await writeFile(path.join(dataDir, PREFERENCES_FILE), '{"stop":"abc"}', 'utf-8');

        expect(await getPreferences(dataDir)).toEqual({});
    });
});
