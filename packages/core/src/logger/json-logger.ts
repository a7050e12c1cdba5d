// =============================================================================
// JSON LOGGER — Structured JSON logging for production environments
// =============================================================================

import type { RowbindLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"rowbind"` */
	service?: string;
	/** Keys to redact from log data. Values replaced with "[REDACTED]". Default: password, token, secret */
	redactKeys?: string[];
	/** Line sink. Default: `console.log` (or `console.error` for warn/error). */
	write?: (line: string, level: LogLevel) => void;
}

function consoleWrite(line: string, level: LogLevel): void {
	if (level === "error" || level === "warn") {
		console.error(line);
	} else {
		console.log(line);
	}
}

/**
 * Create a structured JSON logger implementing `RowbindLogger`.
 *
 * Each log line is emitted as a single-line JSON object suitable for
 * log aggregation systems.
 *
 * @example
 * ```ts
 * import { createJsonLogger } from "@rowbind/core";
 *
 * const logger = createJsonLogger({ level: "debug", service: "billing" });
 * ```
 */
export function createJsonLogger(options: JsonLoggerOptions = {}): RowbindLogger {
	const { level = "info", service = "rowbind", write = consoleWrite } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const safeData = redactData(data, redactKeys);
		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...safeData,
		};

		write(JSON.stringify(entry, jsonReplacer), lvl);
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}

// SQL params may hold bigint and binary values, which JSON.stringify rejects.
function jsonReplacer(_key: string, value: unknown): unknown {
	if (typeof value === "bigint") return value.toString();
	if (value instanceof Uint8Array) return `<${value.byteLength} bytes>`;
	return value;
}
