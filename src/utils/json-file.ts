/**
 * JSON File Storage
 * Schema-validated reads and atomic writes for the flat files under the data directory
 */

import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { z } from 'zod';

/** Thrown when a file exists but its contents are not the expected JSON */
export class JsonFileError extends Error {
    constructor(
        message: string,
        public readonly filePath: string,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'JsonFileError';
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and validate a JSON file
 * @returns Parsed data, or null when the file does not exist
 * @throws JsonFileError when the file is unreadable, not JSON, or fails the schema
 */
export async function readJsonFile<S extends z.ZodTypeAny>(
    filePath: string,
    schema: S
): Promise<z.output<S> | null> {
    let text: string;
    try {
        text = await readFile(filePath, 'utf-8');
    } catch (error) {
        if (isMissingFile(error)) {
            return null;
        }
        throw new JsonFileError(
            `Could not read ${filePath}`,
            filePath,
            error instanceof Error ? error : undefined
        );
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new JsonFileError(
            `${filePath} is not valid JSON`,
            filePath,
            error instanceof Error ? error : undefined
        );
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
        throw new JsonFileError(`${filePath} has an unexpected shape`, filePath, result.error);
    }
    return result.data;
}

/**
 * Write data as pretty-printed UTF-8 JSON
 * Writes a temporary sibling first and renames it over the target, so readers never
 * observe a partial file. Concurrent writers: last rename wins.
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
    const dir = path.dirname(filePath);
    await mkdir(dir, { recursive: true });

    const tempPath = path.join(dir, `.${path.basename(filePath)}.${randomUUID()}.tmp`);
    try {
        await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
        await rename(tempPath, filePath);
    } catch (error) {
        await rm(tempPath, { force: true });
        throw error;
    }
}

/**
 * Delete a file if it exists
 */
export async function removeFile(filePath: string): Promise<void> {
    await rm(filePath, { force: true });
}
