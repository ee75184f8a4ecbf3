import winston from 'winston';

/** Simple logger interface for dependency injection (subset of winston Logger) */
export interface SimpleLogger {
    debug: (message: string, meta?: Record<string, unknown>) => void;
    info: (message: string, meta?: Record<string, unknown>) => void;
    warn: (message: string, meta?: Record<string, unknown>) => void;
    error: (message: string, meta?: Record<string, unknown>) => void;
}

// Custom format for better readability
const customFormat = winston.format.printf(({ level, message, timestamp, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;

    // Add metadata if present
    if (Object.keys(metadata).length > 0) {
        msg += ` ${JSON.stringify(metadata)}`;
    }

    return msg;
});

export interface LoggerOptions {
    level?: string;
    /** Optional path of an additional plain-text log file */
    file?: string;
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize({ all: true }),
                customFormat
            )
        })
    ];

    if (options.file) {
        transports.push(new winston.transports.File({
            filename: options.file,
            format: customFormat
        }));
    }

    return winston.createLogger({
        level: options.level || 'info',
        format: winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.errors({ stack: true })
        ),
        transports
    });
}

// Default logger, level from environment variable or 'info'
export const logger = createLogger({
    level: process.env['LOG_LEVEL'] || 'info',
    file: process.env['LOG_FILE'] || undefined
});

export default logger;
