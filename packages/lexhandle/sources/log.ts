import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    service: string;
    environment: string;
};

const MODULE_WIDTH = 16;
const PRETTY_RESERVED_FIELDS = new Set([
    "pid",
    "hostname",
    "level",
    "time",
    "service",
    "environment",
    "module",
    "msg"
]);
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }

    rootLogger = buildLogger(resolveLogConfig(overrides));
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

/**
 * Resolves logging settings from overrides, then LEXHANDLE_LOG_* and LOG_* variables.
 * File destinations always use json.
 */
export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("LEXHANDLE_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    const destination = overrides.destination ?? envValue("LEXHANDLE_LOG_DEST") ?? envValue("LOG_DEST") ?? "stderr";
    const forceJson = parseBooleanFlag(envValue("LEXHANDLE_LOG_JSON")) ?? false;
    let format: LogFormat =
        overrides.format ??
        parseFormat(envValue("LEXHANDLE_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        (forceJson ? "json" : "pretty");

    if (!isStdDestination(destination)) {
        format = "json";
    }

    return {
        level,
        format,
        destination,
        service: overrides.service ?? "lexhandle",
        environment: overrides.environment ?? envValue("NODE_ENV") ?? "development"
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: {
            service: config.service,
            environment: config.environment
        },
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    const destination = resolveDestination(config.destination);

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            const prettyStream = prettyFactory({
                colorize: true,
                ignore: "pid,hostname,service,environment,module",
                hideObject: true,
                messageFormat: formatPrettyMessage,
                destination: config.destination === "stderr" ? 2 : 1
            });
            return pino(options, prettyStream);
        }
    }

    return destination ? pino(options, destination) : pino(options);
}

/**
 * Renders "[module          ] message key=value" for pino-pretty.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const module = normalizeModule(typeof log.module === "string" ? log.module : undefined);
    const label = `[${module.length > MODULE_WIDTH ? module.slice(0, MODULE_WIDTH) : module.padEnd(MODULE_WIDTH, " ")}]`;
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${formatDetailValue(value)}`);
    }
    const content = [message, ...details].filter((part) => part.length > 0).join(" ");
    return content.length > 0 ? `${label} ${content}` : label;
}

function formatDetailValue(value: unknown): string {
    if (value instanceof Error) {
        return JSON.stringify(value.message);
    }
    if (typeof value === "string") {
        return /[=\s]/.test(value) || value.length === 0 ? JSON.stringify(value) : value;
    }
    if (typeof value === "object" && value !== null) {
        return JSON.stringify(value);
    }
    return String(value);
}

function normalizeModule(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

type PrettyFactory = (options: Record<string, unknown>) => DestinationStream;

function resolvePrettyFactory(): PrettyFactory | null {
    try {
        const factory: PrettyFactory = nodeRequire("pino-pretty");
        return factory;
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    const normalized = value?.toLowerCase().trim();
    return normalized === "pretty" || normalized === "json" ? normalized : null;
}

function parseBooleanFlag(value: string | null): boolean | null {
    if (!value) {
        return null;
    }
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) {
        return true;
    }
    if (["0", "false", "no", "off"].includes(normalized)) {
        return false;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key]?.trim();
    return value ? value : null;
}

function isStdDestination(destination: LogDestination): boolean {
    return destination === "stdout" || destination === "stderr";
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
