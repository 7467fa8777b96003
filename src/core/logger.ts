/**
 * Leveled console logger, one tagged instance per engine module
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

let minLevel: LogLevel = import.meta.env.DEV ? 'debug' : 'info';

/** Raise or lower the threshold for every logger at once */
export function setLogLevel(level: LogLevel): void {
    minLevel = level;
}

export function formatMessage(level: LogLevel, module: string, msg: string): string {
    const time = new Date().toISOString().slice(11, 23);
    return `[${time}] [${level.toUpperCase()}] [${module}] ${msg}`;
}

export type Logger = Record<LogLevel, (msg: string, ...args: unknown[]) => void>;

function write(level: LogLevel, line: string, args: unknown[]): void {
    switch (level) {
        case 'debug':
            console.debug(line, ...args);
            break;
        case 'info':
            console.info(line, ...args);
            break;
        case 'warn':
            console.warn(line, ...args);
            break;
        case 'error':
            console.error(line, ...args);
            break;
    }
}

export function createLogger(module: string): Logger {
    const at = (level: LogLevel) => (msg: string, ...args: unknown[]) => {
        // Threshold is read per call so setLogLevel reaches existing loggers
        if (LEVELS.indexOf(level) < LEVELS.indexOf(minLevel)) return;
        write(level, formatMessage(level, module, msg), args);
    };
    return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}
