/**
 * Main entry point
 */

import { loadConfig } from '@/config';
import type { AppConfig } from '@/config';
import { Logger } from '@/utils/logger';
import { createCoreServices } from '@/core';
import { describeError, runCli } from '@/cli';

async function main(argv: string[]): Promise<number> {
    // Quiet unless asked; command output owns the terminal
    Logger.setLevel('WARN');

    let config: AppConfig;
    try {
        config = await loadConfig();
    } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        console.error(describeError(failure));
        return 1;
    }

    return runCli(argv, {
        config,
        services: createCoreServices(config),
        out: text => console.log(text),
        err: text => console.error(text),
    });
}

process.exitCode = await main(process.argv.slice(2));
