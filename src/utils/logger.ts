import pino, { type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig } from "../config/types";

let loggerInstance: Logger | null = null;

const baseOptions: LoggerOptions = {
    base: undefined,
    redact: {
        paths: ["apiKey", "*.apiKey", "req.headers.authorization", 'req.headers["x-api-key"]'],
        censor: "[redacted]",
    },
};

export function configureLogger(config: LoggingConfig): Logger {
    loggerInstance = pino({
        ...baseOptions,
        level: config.level,
        transport: config.pretty
            ?   {
                    target: "pino-pretty",
                    options: {
                        colorize: true,
                        translateTime: "SYS:standard",
                        ignore: "module",
                        messageFormat: "{if module}[{module}] {end}{msg}",
                    }
                }
            : undefined,
    });
    return loggerInstance;
}

export function getLogger(): Logger {
    if(!loggerInstance) {
        loggerInstance = pino({
            ...baseOptions,
            level: "info",
        });
    }
    return loggerInstance;
}
