import { pino, type Logger, type LevelWithSilent } from 'pino';

export interface LogLine {
    level: number;
    msg: string;
    [key: string]: unknown;
}

/**
 * Logger that keeps its output in memory
 */
export function captureLogger(level: LevelWithSilent = 'info'): { logger: Logger; lines: LogLine[] } {
    const lines: LogLine[] = [];
    const logger = pino({ level }, {
        write(msg: string) {
            lines.push(JSON.parse(msg));
        },
    });
    return { logger, lines };
}

export function silentLogger(): Logger {
    return pino({ level: 'silent' });
}
