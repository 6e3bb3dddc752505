/**
 * Configuration Loader
 * Loads and validates configuration from a JSON file, with environment overrides
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigSchema, ConfigValidationError } from './schema';
import type { AppConfig } from './schema';

export const DEFAULT_CONFIG_FILE = 'citybus.config.json';

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load configuration from a JSON file
 * Call once at startup. Reads .env first so CITYBUS_* variables can come from there.
 */
export async function loadConfig(
    filePath?: string,
    env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
    dotenv.config();

    const resolvedPath = path.resolve(filePath ?? env.CITYBUS_CONFIG ?? DEFAULT_CONFIG_FILE);

    let rawConfig: unknown = {};
    try {
        rawConfig = JSON.parse(await readFile(resolvedPath, 'utf-8'));
    } catch (error) {
        if (!isMissingFile(error)) {
            const message = `Could not read config file ${resolvedPath}: ${String(error)}`;
            throw new ConfigValidationError(
                message,
                new z.ZodError([{ code: z.ZodIssueCode.custom, path: [], message }])
            );
        }
        // No config file: every field falls back to its default
    }

    const result = ConfigSchema.safeParse(rawConfig);
    if (!result.success) {
        // eslint-disable-next-line no-console -- Logger not configured before config loads
        console.error('Config validation errors:', result.error.format());
        throw new ConfigValidationError('Invalid configuration', result.error);
    }

    const loaded = result.data;
    if (env.CITYBUS_DATA_DIR) {
        loaded.storage.dataDir = env.CITYBUS_DATA_DIR;
    }

    return loaded;
}
