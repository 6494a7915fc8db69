/**
 * Returns the current timestamp in ISO format.
 * @returns string - Current ISO timestamp
 * @example
 * const ts = GetTimestamp(); // '2026-06-24T12:34:56.789Z'
 */
export function GetTimestamp(): string {
    return new Date().toISOString();
}

/**
 * Log levels for application logging.
 */
export enum LogLevel {
    Critical = 'CRITICAL',
    Error = 'ERROR',
    Warning = 'WARNING',
    Info = 'INFO',
    Debug = 'DEBUG',
}

/** Verbosity names accepted by configuration (`log_level`). */
export type LogThreshold = `debug` | `info` | `warn` | `error`;

const SEVERITY: Record<LogLevel, number> = {
    [LogLevel.Debug]: 10,
    [LogLevel.Info]: 20,
    [LogLevel.Warning]: 30,
    [LogLevel.Error]: 40,
    [LogLevel.Critical]: 50,
};

const THRESHOLD_SEVERITY: Record<LogThreshold, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

let _threshold: number = THRESHOLD_SEVERITY.info; // process-wide minimum severity

/**
 * Sets the minimum level that reaches the console.
 * @param threshold LogThreshold - Lowest level still printed
 * @example
 * SetLogLevel('debug');
 */
export function SetLogLevel(threshold: LogThreshold): void {
    _threshold = THRESHOLD_SEVERITY[threshold];
}

/**
 * Logs a message at the specified log level, prepending a timestamp and source.
 * @param level LogLevel - Level of the log
 * @param message string - Message to log
 * @param from string - Source identifier (class or module name)
 * @param context string - Optional additional context
 * @example
 * log(LogLevel.Info, 'Library opened', 'AssetManager');
 */
export function log(level: LogLevel, message: string, from: string, context?: string): void {
    if (SEVERITY[level] < _threshold) {
        return;
    }
    const timestamp = GetTimestamp();
    const body = context ? `[${context}] ${message}` : message;
    const formatted = `[${timestamp}] [${from}] ${body}`;
    const logger = console;

    switch (level) {
        case LogLevel.Critical:
        case LogLevel.Error:
            logger.error(formatted);
            break;
        case LogLevel.Warning:
            logger.warn(formatted);
            break;
        case LogLevel.Info:
            logger.info(formatted);
            break;
        case LogLevel.Debug:
            logger.debug(formatted);
            break;
    }
}

export namespace log {
    /**
     * Logs a critical level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function critical(message: string, from: string, context?: string): void {
        log(LogLevel.Critical, message, from, context);
    }

    /**
     * Logs an error level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function error(message: string, from: string, context?: string): void {
        log(LogLevel.Error, message, from, context);
    }

    /**
     * Logs a warning level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function warning(message: string, from: string, context?: string): void {
        log(LogLevel.Warning, message, from, context);
    }

    /**
     * Logs an informational level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function info(message: string, from: string, context?: string): void {
        log(LogLevel.Info, message, from, context);
    }

    /**
     * Logs a debug level message.
     * @param message string - Message to log
     * @param from string - Context or source identifier
     * @param context string - Optional additional context or details
     */
    export function debug(message: string, from: string, context?: string): void {
        log(LogLevel.Debug, message, from, context);
    }
}
