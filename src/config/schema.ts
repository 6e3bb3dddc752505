/**
 * Configuration Schema
 * Every field has a default, so an empty file (or none) is a valid configuration
 */

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const ConfigSchema = z.object({
    debug: z.boolean().default(false),
    api: z
        .object({
            /** Request timeout for the token page and API calls (ms) */
            timeout: z.number().positive().default(15000),
        })
        .default({}),
    citybus: z
        .object({
            /** REST API base URL, including language and city segments */
            apiBaseUrl: z.string().url().default('https://rest.citybus.gr/api/v1/el/112'),
            /** Web page whose inline script carries the bearer token */
            tokenPageUrl: z.string().url().default('https://patra.citybus.gr/el/stops'),
            /** Origin of the official web front-end, sent as Origin and Referer */
            webOrigin: z.string().url().default('https://patra.citybus.gr'),
            userAgent: z
                .string()
                .default(
                    'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:140.0) Gecko/20100101 Firefox/140.0'
                ),
        })
        .default({}),
    storage: z
        .object({
            /** Directory holding the stop cache, preferences, bookmarks and saved location */
            dataDir: z.string().min(1).default(path.join(os.homedir(), '.citybus')),
        })
        .default({}),
    defaults: z
        .object({
            stop: z.number().int().positive().default(214),
            /** 1 = Monday ... 7 = Sunday */
            day: z.number().int().min(1).max(7).default(5),
        })
        .default({}),
    nearby: z
        .object({
            /** Search radius used when --nearby is given without a value (meters) */
            defaultRadius: z.number().nonnegative().default(500),
        })
        .default({}),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export class ConfigValidationError extends Error {
    constructor(
        message: string,
        public errors: z.ZodError
    ) {
        super(message);
        this.name = 'ConfigValidationError';
    }

    /** Get user-friendly error message listing each invalid field */
    getUserMessage(): string {
        const issues = this.errors.issues.map(
            issue => `${issue.path.join('.') || 'config'}: ${issue.message}`
        );
        return `${this.message}. ${issues.join('; ')}`;
    }
}
