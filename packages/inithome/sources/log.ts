import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

import { envValueRead } from "./utils/envValueRead.js";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    service: string;
};

const MODULE_WIDTH = 16;
const PRETTY_RESERVED_FIELDS = new Set(["pid", "hostname", "level", "time", "service", "module", "msg"]);
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }
    rootLogger = buildLogger(resolveLogConfig(overrides));
    return rootLogger;
}

export function getLogger(moduleName: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: moduleName });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValueRead(process.env, "INITHOME_LOG_LEVEL") ??
        envValueRead(process.env, "LOG_LEVEL") ??
        (isUnitTestRun() ? "silent" : isDev ? "debug" : "info");
    const destination = overrides.destination ?? envValueRead(process.env, "INITHOME_LOG_DEST") ?? "stderr";
    const forceJson = parseBooleanFlag(envValueRead(process.env, "INITHOME_LOG_JSON")) ?? false;
    let format =
        overrides.format ?? parseFormat(envValueRead(process.env, "INITHOME_LOG_FORMAT")) ?? (forceJson ? "json" : "pretty");

    // Files always get machine-readable lines.
    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    return {
        level,
        format,
        destination,
        service: overrides.service ?? "inithome"
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { service: config.service },
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            const prettyStream = prettyFactory({
                colorize: !process.env.NO_COLOR,
                ignore: "pid,hostname,level,service,module",
                hideObject: true,
                messageFormat: formatPrettyMessage,
                sync: true,
                destination: config.destination === "stdout" ? 1 : 2
            });
            return pino(options, prettyStream);
        }
    }

    return pino(options, resolveDestination(config.destination));
}

/**
 * Renders one pretty log line as "[HH:MM:SS] [module] message key=value".
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const time = formatLogTime(log.time);
    const moduleName = typeof log.module === "string" && log.module.trim().length > 0 ? log.module.trim() : "unknown";
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);

    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        details.push(`${key}=${formatDetailValue(value)}`);
    }

    const label = `[${moduleName.slice(0, MODULE_WIDTH).padEnd(MODULE_WIDTH, " ")}]`;
    const content = [label, message, ...details].filter((part) => part.length > 0).join(" ");
    return `[${time}] ${content}`;
}

function formatDetailValue(value: unknown): string {
    if (value instanceof Error) {
        return JSON.stringify(value.message);
    }
    if (typeof value === "object" && value !== null) {
        const message = "message" in value && typeof value.message === "string" ? value.message : null;
        return JSON.stringify(message ?? value);
    }
    const text = String(value);
    return /[=\s]/.test(text) || text.length === 0 ? JSON.stringify(text) : text;
}

function formatLogTime(value: unknown): string {
    let date = typeof value === "number" || typeof value === "string" ? new Date(value) : new Date();
    if (Number.isNaN(date.getTime())) {
        date = new Date();
    }
    return [date.getHours(), date.getMinutes(), date.getSeconds()]
        .map((part) => String(part).padStart(2, "0"))
        .join(":");
}

function resolveDestination(destination: LogDestination): DestinationStream {
    if (destination === "stdout") {
        return pino.destination({ dest: 1, sync: true });
    }
    if (destination === "stderr") {
        return pino.destination({ dest: 2, sync: true });
    }
    // The process exits right after provisioning, so writes stay synchronous.
    return pino.destination({ dest: destination, mkdir: true, sync: true });
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase();
    return normalized === "json" || normalized === "pretty" ? normalized : null;
}

function parseBooleanFlag(value: string | null): boolean | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
        return true;
    }
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
        return false;
    }
    return null;
}

function isUnitTestRun(): boolean {
    return process.env.VITEST === "true" || process.env.VITEST === "1";
}
