import winston from "winston";

export interface Logger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}

export interface LoggerOptions {
    level?: "error" | "warn" | "info" | "debug";
    transports?: winston.LoggerOptions["transports"];
}

/** Console JSON logger used when the caller does not supply one. */
export function createLogger(options: LoggerOptions = {}): Logger {
    const base = winston.createLogger({
        level: options.level ?? "info",
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.json()
        ),
        transports: options.transports ?? [new winston.transports.Console()],
    });

    return {
        debug: (message, ...meta) => { base.debug(message, ...meta); },
        info: (message, ...meta) => { base.info(message, ...meta); },
        warn: (message, ...meta) => { base.warn(message, ...meta); },
        error: (message, ...meta) => { base.error(message, ...meta); },
    };
}
