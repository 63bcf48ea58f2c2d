// src/core/watcher.ts

import path from 'path';
import chokidar from 'chokidar';
import { runOnce, type RunOptions, type RunReport } from './runner';
import { resolveDeclarationPath } from './config-loader';
import { defaultLogger, type Logger } from '../util/logger';

export interface WatchOptions extends RunOptions {
    /**
     * Debounce delay in milliseconds between detected changes
     * and a re-run.
     *
     * Default: 150 ms
     */
    debounceMs?: number;

    /**
     * Called with every completed report.
     */
    onReport?: (report: RunReport) => void;
}

export interface WatchHandle {
    close(): Promise<void>;
}

/**
 * Watch a declaration file and re-check it whenever it changes.
 *
 * The file is checked once on start; overlapping changes while a check
 * is running queue exactly one more run.
 */
export function watchDeclarations(target: string, cwd: string, options: WatchOptions = {}): WatchHandle {
    const logger: Logger = options.logger ?? defaultLogger.child('[watch]');
    const sourcePath = resolveDeclarationPath(path.resolve(cwd, target));
    const debounceMs = options.debounceMs ?? 150;

    logger.info(`Watching declarations: ${sourcePath}`);

    let timer: NodeJS.Timeout | undefined;
    let running = false;
    let pending = false;

    async function run() {
        if (running) {
            pending = true;
            return;
        }
        running = true;
        try {
            logger.debug('Change detected, re-checking declarations...');
            const report = await runOnce(sourcePath, cwd, options);
            options.onReport?.(report);
        } catch (err) {
            logger.error('Check failed:', err);
        } finally {
            running = false;
            if (pending) {
                pending = false;
                scheduleRun();
            }
        }
    }

    function scheduleRun() {
        if (timer) clearTimeout(timer);
        timer = setTimeout(() => {
            void run();
        }, debounceMs);
    }

    const watcher = chokidar.watch(sourcePath, {
        ignoreInitial: true,
        persistent: true,
    });

    watcher
        .on('all', (event, filePath) => {
            logger.debug(`Event ${event} on ${filePath}`);
            scheduleRun();
        })
        .on('error', (error) => {
            logger.error('Watcher error:', error);
        });

    // Initial run
    scheduleRun();

    return {
        async close() {
            if (timer) clearTimeout(timer);
            await watcher.close();
        },
    };
}
