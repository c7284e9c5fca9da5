import { readFileSync } from "node:fs";
import { globSync } from "glob";
import * as YAML from "yaml";
import { z } from "zod";
import type { BridgeConfig } from "../model/config";
import { ConfigError, describeError } from "./errors";
import { createLogger } from "./log";

const logger = createLogger(module);

// YAML reads `port: 5672` as a number and `password:` as null.
const text = z.preprocess(
    (v) => (typeof v === "number" ? String(v) : v === null ? "" : v),
    z.string().min(1, "must not be empty"),
);
const optionalText = z.preprocess(
    (v) =>
        typeof v === "number" ? String(v) : v === null || v === "" ? undefined : v,
    z.string().optional(),
);
const port = z.preprocess(
    (v) => (typeof v === "string" && /^\d+$/.test(v.trim()) ? Number(v) : v),
    z.number().int().min(1).max(65535),
);

const configFileSchema = z.object({
    bridge: z.object({
        name: text,
    }),
    rabbitmq: z.object({
        host: text,
        port,
        vhost: text,
        // Present but empty selects the default exchange.
        exchange: z.preprocess((v) => (v === null ? "" : v), z.string()),
        exchange_type: text,
        username: text,
        password: text,
        queue: optionalText,
    }),
    postgres: z.object({
        host: text,
        port,
        database: text,
        username: text,
        password: text,
        channel: text,
    }),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

function describeIssue(issue: z.ZodIssue): string {
    const [section, key] = issue.path;
    if (
        issue.code === z.ZodIssueCode.invalid_type &&
        issue.received === "undefined"
    ) {
        return key === undefined
            ? `Missing configuration section ${section}.`
            : `Missing configuration option ${section}:${key}.`;
    }
    if (issue.path.length === 0) {
        return `Invalid configuration: ${issue.message}.`;
    }
    return `Invalid configuration option ${issue.path.join(":")}: ${issue.message}.`;
}

/**
 * The channel is quoted in `LISTEN`, so its case is kept. An unquoted
 * `NOTIFY Orders` folds to `orders` and never reaches it.
 */
export function channelCaseWarning(channel: string): string | null {
    if (channel === channel.toLowerCase()) {
        return null;
    }
    return `Channel "${channel}" contains upper-case letters and only receives notifications sent with NOTIFY "${channel}" (quoted).`;
}

/**
 * Validate one parsed configuration unit. Every problem is reported, not
 * just the first.
 */
export function validateBridgeConfig(
    data: unknown,
    source: string,
): BridgeConfig {
    const result = configFileSchema.safeParse(data);
    if (!result.success) {
        throw new ConfigError(source, result.error.issues.map(describeIssue));
    }
    const { bridge, rabbitmq, postgres } = result.data;
    const warning = channelCaseWarning(postgres.channel);
    if (warning) {
        logger.warn(`${source}: ${warning}`);
    }
    return {
        name: bridge.name,
        rabbitmq: {
            host: rabbitmq.host,
            port: rabbitmq.port,
            vhost: rabbitmq.vhost,
            exchange: rabbitmq.exchange,
            exchangeType: rabbitmq.exchange_type,
            username: rabbitmq.username,
            password: rabbitmq.password,
            ...(rabbitmq.queue === undefined ? {} : { queue: rabbitmq.queue }),
        },
        postgres: { ...postgres },
    };
}

export function parseBridgeConfig(source: string, content: string) {
    let data: unknown;
    try {
        data = YAML.parse(content);
    } catch (e: unknown) {
        throw new ConfigError(source, [`Invalid YAML: ${describeError(e)}`]);
    }
    return validateBridgeConfig(data, source);
}

export function readBridgeConfig(filename: string) {
    logger.debug(`Parsing config file ${filename}.`);
    let content: string;
    try {
        content = readFileSync(filename, "utf-8");
    } catch (e: unknown) {
        throw new ConfigError(filename, [
            `Unable to read file: ${describeError(e)}`,
        ]);
    }
    return parseBridgeConfig(filename, content);
}

/**
 * Expand paths and glob patterns, in argument order. Matches of a single
 * pattern are sorted; a file named twice is loaded once.
 */
export function expandConfigPaths(patterns: string[]): string[] {
    const files: string[] = [];
    for (const pattern of patterns) {
        const matches = globSync(pattern, { nodir: true }).sort();
        if (matches.length === 0) {
            logger.warn(`No configuration file matches "${pattern}".`);
        }
        for (const match of matches) {
            if (!files.includes(match)) {
                files.push(match);
            }
        }
    }
    return files;
}

export interface LoadOptions {
    /** Let a later file replace an earlier one with the same bridge name. */
    allowDuplicateNames?: boolean;
}

export function loadBridgeConfigs(
    patterns: string[],
    { allowDuplicateNames = false }: LoadOptions = {},
): BridgeConfig[] {
    const files = expandConfigPaths(patterns);
    if (files.length === 0) {
        throw new ConfigError("command line", [
            "No configuration files found.",
        ]);
    }
    const configs = new Map<string, [file: string, config: BridgeConfig]>();
    for (const file of files) {
        const config = readBridgeConfig(file);
        const previous = configs.get(config.name);
        if (previous) {
            const message = `Duplicate bridge name "${config.name}" (already defined in ${previous[0]}).`;
            if (!allowDuplicateNames) {
                throw new ConfigError(file, [message]);
            }
            logger.warn(`${file}: ${message} Replacing the earlier bridge.`);
        }
        configs.set(config.name, [file, config]);
    }
    return Array.from(configs.values(), ([, config]) => config);
}
