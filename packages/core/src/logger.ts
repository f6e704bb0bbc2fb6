/**
 * Logger
 *
 * Emits log records through the global OpenTelemetry logger provider.
 * Until an SDK registers a provider the records go to the no-op logger.
 *
 * @module logger
 */

import type { AnyValueMap } from "@opentelemetry/api-logs";
import { logs, SeverityNumber } from "@opentelemetry/api-logs";
import type { LogLevel } from "./config/envSchema.ts";

export interface LoggerOptions {
    /** Records below this level are dropped */
    level?: LogLevel | undefined;
    defaultAttributes?: AnyValueMap | undefined;
}

export interface Logger {
    debug(message: string, attributes?: AnyValueMap): void;
    info(message: string, attributes?: AnyValueMap): void;
    warn(message: string, attributes?: AnyValueMap): void;
    error(message: string, attributes?: AnyValueMap): void;
}

const SEVERITY = new Map<LogLevel, SeverityNumber>([
    ["debug", SeverityNumber.DEBUG],
    ["info", SeverityNumber.INFO],
    ["warn", SeverityNumber.WARN],
    ["error", SeverityNumber.ERROR],
]);

export function getLogger(name = "interlock", options?: LoggerOptions): Logger {
    const otelLogger = logs.getLogger(name);
    const threshold = SEVERITY.get(options?.level ?? "info") ?? SeverityNumber.INFO;
    const defaultAttrs = options?.defaultAttributes;

    function emitLog(level: LogLevel, message: string, attributes?: AnyValueMap): void {
        const severityNumber = SEVERITY.get(level) ?? SeverityNumber.INFO;
        if (severityNumber < threshold) {
            return;
        }
        const base: AnyValueMap = { "logger.name": name, ...defaultAttrs };
        otelLogger.emit({
            severityNumber,
            severityText: level.toUpperCase(),
            body: message,
            attributes: attributes ? { ...base, ...attributes } : base,
        });
    }

    return {
        debug(message, attributes?) {
            emitLog("debug", message, attributes);
        },
        info(message, attributes?) {
            emitLog("info", message, attributes);
        },
        warn(message, attributes?) {
            emitLog("warn", message, attributes);
        },
        error(message, attributes?) {
            emitLog("error", message, attributes);
        },
    };
}
