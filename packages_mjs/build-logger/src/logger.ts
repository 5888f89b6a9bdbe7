/**
 * Imageforge Logger
 * Provides standardized, prefixed logging with multiple levels.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface ImageforgeLogger {
    error(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
    trace(message: string, ...args: unknown[]): void;
}

export const LOG_LEVELS: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
    trace: 5
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.keys(LOG_LEVELS).includes(value);
}

let currentLevel: LogLevel = 'info';

// Detect initial log level from env
const envLevel = process.env.IMAGEFORGE_LOG_LEVEL?.toLowerCase();
if (envLevel && isLogLevel(envLevel)) {
    currentLevel = envLevel;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export function setLogLevel(level: LogLevel): void {
    if (isLogLevel(level)) {
        currentLevel = level;
    }
}

type MessageLevel = Exclude<LogLevel, 'silent'>;

// Console method used for each level
const CONSOLE_METHODS: Record<MessageLevel, 'error' | 'warn' | 'info' | 'debug' | 'log'> = {
    error: 'error',
    warn: 'warn',
    info: 'info',
    debug: 'debug',
    trace: 'log'
};

class ConsoleLogger implements ImageforgeLogger {
    constructor(private readonly prefix: string) { }

    private write(level: MessageLevel, message: string, args: unknown[]): void {
        if (LOG_LEVELS[level] > LOG_LEVELS[currentLevel]) {
            return;
        }
        console[CONSOLE_METHODS[level]](`${this.prefix} ${message}`, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        this.write('error', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.write('warn', message, args);
    }

    info(message: string, ...args: unknown[]): void {
        this.write('info', message, args);
    }

    debug(message: string, ...args: unknown[]): void {
        this.write('debug', message, args);
    }

    trace(message: string, ...args: unknown[]): void {
        this.write('trace', message, args);
    }
}

const loggers = new Map<string, ImageforgeLogger>();

/**
 * Get the logger for a component. Loggers are cached per prefix and share the
 * process-wide level.
 */
export function createLogger(name: string): ImageforgeLogger {
    const prefix = `[${name}]`;
    let logger = loggers.get(prefix);
    if (!logger) {
        logger = new ConsoleLogger(prefix);
        loggers.set(prefix, logger);
    }
    return logger;
}
