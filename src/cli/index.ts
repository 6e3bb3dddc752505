/**
 * CLI Runner
 * Maps a parsed command onto the core services and prints the result
 */

import { Logger } from '@utils/logger';
import { BookmarksManager } from '@utils/bookmarks';
import { getPreferences, savePreferences } from '@utils/preferences';
import { saveLocation } from '@utils/location-storage';
import type { AppConfig } from '@config/index';
import type { CoreServices } from '@core/index';
import { USAGE, UsageError, parseCommandLine } from './args';
import type { Command } from './args';
import {
    renderBookmarks,
    renderLive,
    renderNames,
    renderNearby,
    renderSchedule,
} from './render';

export interface CliContext {
    config: AppConfig;
    services: CoreServices;
    /** Standard output */
    out: (text: string) => void;
    /** Standard error */
    err: (text: string) => void;
    now?: () => Date;
}

/** Errors from the core all offer a message meant for the user */
function hasUserMessage(error: Error): error is Error & { getUserMessage(): string } {
    return 'getUserMessage' in error && typeof error.getUserMessage === 'function';
}

export function describeError(error: Error): string {
    return hasUserMessage(error) ? error.getUserMessage() : error.message;
}

async function resolveStop(ctx: CliContext, stop: number | undefined): Promise<number> {
    if (stop !== undefined) return stop;
    const preferences = await getPreferences(ctx.config.storage.dataDir);
    return preferences.stop ?? ctx.config.defaults.stop;
}

async function resolveDay(ctx: CliContext, day: number | undefined): Promise<number> {
    if (day !== undefined) return day;
    const preferences = await getPreferences(ctx.config.storage.dataDir);
    return preferences.day ?? ctx.config.defaults.day;
}

function requireStop(stop: number | undefined, flag: string): number {
    if (stop === undefined) {
        throw new UsageError(`${flag} needs --stop <code>`);
    }
    return stop;
}

/**
 * Execute one command
 * @returns Process exit code
 */
export async function execute(command: Command, ctx: CliContext): Promise<number> {
    const { services, config } = ctx;
    const dataDir = config.storage.dataDir;
    const now = ctx.now ?? (() => new Date());

    switch (command.kind) {
        case 'help':
            ctx.out(USAGE);
            return 0;

        case 'schedule': {
            const stop = await resolveStop(ctx, command.stop);
            const day = await resolveDay(ctx, command.day);
            const result = await services.departures.getSchedule(stop, day);
            if (!result.success) {
                ctx.err(describeError(result.error));
                return 1;
            }
            ctx.out(renderSchedule(result.board));
            return 0;
        }

        case 'live': {
            const stop = await resolveStop(ctx, command.stop);
            const result = await services.departures.getLive(stop, now());
            if (!result.success) {
                ctx.err(describeError(result.error));
                return 1;
            }
            ctx.out(renderLive(result.board));
            return 0;
        }

        case 'names': {
            const names = await services.stops.searchNames(command.query);
            ctx.out(renderNames(names));
            return 0;
        }

        case 'nearby': {
            const radius = command.radius ?? config.nearby.defaultRadius;
            const result = await services.stops.getNearby(radius, command.origin);
            if (!result.success) {
                ctx.err(describeError(result.error));
                return 1;
            }
            const bookmarked = await new BookmarksManager(dataDir).getCodes();
            ctx.out(renderNearby(result.results, result.origin, radius, bookmarked));
            return 0;
        }

        case 'save-location': {
            await saveLocation(dataDir, command.origin, now().getTime());
            ctx.out(
                `Saved location ${command.origin.latitude}, ${command.origin.longitude} for --nearby`
            );
            return 0;
        }

        case 'set-default': {
            const saved = await savePreferences(dataDir, {
                stop: command.stop,
                day: command.day,
            });
            ctx.out(`Defaults: stop ${saved.stop ?? config.defaults.stop}, day ${saved.day ?? config.defaults.day}`);
            return 0;
        }

        case 'bookmark': {
            const stop = requireStop(command.stop, '--bookmark');
            await new BookmarksManager(dataDir).add(stop);
            ctx.out(`Bookmarked stop ${stop}`);
            return 0;
        }

        case 'unbookmark': {
            const stop = requireStop(command.stop, '--unbookmark');
            const removed = await new BookmarksManager(dataDir).remove(stop);
            ctx.out(removed ? `Removed bookmark for stop ${stop}` : `Stop ${stop} was not bookmarked`);
            return 0;
        }

        case 'bookmarks': {
            const bookmarks = await new BookmarksManager(dataDir).getAll();
            const names = bookmarks.length > 0 ? await services.stops.searchNames() : {};
            ctx.out(renderBookmarks(bookmarks, names));
            return 0;
        }

        case 'refresh-stops': {
            const directory = await services.cache.refresh();
            ctx.out(`Cached ${directory.length} stops`);
            return 0;
        }
    }
}

/**
 * Parse argv and execute; every failure becomes a message on stderr and exit code 1
 */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
    try {
        const { command, debug } = parseCommandLine(argv, ctx.now?.());
        if (debug || ctx.config.debug) {
            Logger.setLevel('DEBUG');
            Logger.setDebugMode(true);
        }
        return await execute(command, ctx);
    } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        if (failure instanceof UsageError) {
            ctx.err(`${failure.message}\n\n${USAGE}`);
            return 2;
        }
        Logger.debug('Command failed', failure);
        ctx.err(describeError(failure));
        return 1;
    }
}
