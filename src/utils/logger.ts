import { pino, destination, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Root logger. Writes JSON lines to stderr so that command output on stdout stays parseable.
 */
const rootLogger: Logger = pino(
    {
        name: 'waypost',
        level: parseLogLevel(process.env.WAYPOST_LOG_LEVEL) ?? 'info',
    },
    destination(2)
);

/**
 * Get a logger for a module. Children take the root level at the time they are created,
 * so call this when constructing a component, not at import time.
 */
export function getLogger(module: string): Logger {
    return rootLogger.child({ module });
}

/**
 * Change the level of the root logger (e.g. for `--verbose`)
 */
export function setLogLevel(level: LevelWithSilent): void {
    rootLogger.level = level;
}

export function parseLogLevel(value: string | undefined): LevelWithSilent | undefined {
    if (!value) return undefined;
    const normalized = value.trim().toLowerCase();
    return LOG_LEVELS.find(level => level === normalized);
}
