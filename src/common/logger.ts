import winston from "winston";
import { config } from "./config";

export type LogMeta = Record<string, unknown>;

const jsonFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
);

const prettyFormat = winston.format.combine(
    winston.format.timestamp({ format: "HH:mm:ss.SSS" }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, scope, ...meta }) => {
        const scopeStr = typeof scope === "string" ? ` [${scope}]` : "";
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
        return `${String(timestamp)} ${level}${scopeStr}: ${String(message)}${metaStr}`;
    })
);

export const logger = winston.createLogger({
    level: config.logging.level,
    silent: config.logging.silent,
    format: config.logging.format === "json" ? jsonFormat : prettyFormat,
    transports: [
        // everything goes to stderr so stdout stays free for callers
        new winston.transports.Console({
            stderrLevels: ["error", "warn", "info", "debug", "silly"],
        }),
    ],
});

/**
 * Returns a child logger that tags every entry with a scope name.
 */
export const scopedLogger = (scope: string): winston.Logger => {
    return logger.child({ scope });
}
