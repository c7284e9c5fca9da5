import * as winston from "winston";

const LEVELS = ["error", "warn", "info", "debug"];

// Unknown level names fall back to info.
export const envLogLevel = LEVELS.includes(process.env.LOG_LEVEL ?? "")
    ? String(process.env.LOG_LEVEL)
    : "info";

/** Fields attached to every line a child logger writes. */
export interface LogContext {
    label: string;
    bridge?: string;
}

export function formatLine(info: winston.Logform.TransformableInfo): string {
    const bridge = typeof info.bridge === "string" ? `[${info.bridge}]` : "";
    return `[${info.timestamp}][${info.label}]${bridge}[${info.level}] ${info.message}`;
}

export const mainLogger = winston.createLogger({
    level: envLogLevel,
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.timestamp({
                    format: "YYYY-MM-DD HH:mm:ss",
                }),
                winston.format.printf(formatLine),
                winston.format.colorize({ all: true }),
            ),
        }),
    ],
});

/** `dir/file.ts` for a module, the string itself otherwise. */
export function labelOf(base: string | NodeModule): string {
    if (typeof base === "string") {
        return base;
    }
    const parts = base.filename.split(/[\\/]/);
    return parts.slice(-2).join("/");
}

export const createLogger = (
    base: string | NodeModule = "unknown",
    context: Omit<LogContext, "label"> = {},
) => mainLogger.child({ ...context, label: labelOf(base) });

/**
 * Logger for a single bridge. Every line carries the bridge name, so output
 * from bridges running side by side can be told apart.
 */
export const bridgeLogger = (name: string) =>
    createLogger("bridge", { bridge: name });

export type Logger = ReturnType<typeof createLogger>;

export interface HasLogger {
    logger: Logger;
}
