// =============================================================================
// CONSOLE LOGGER — Built-in RowbindLogger backed by console.*
// =============================================================================

import pc from "picocolors";
import type { RowbindLogger } from "../types/config.js";
import { LEVEL_PRIORITY, type LogLevel } from "./levels.js";
import { buildRedactKeys, redactData } from "./redact.js";

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
	debug: pc.magenta,
	info: pc.blue,
	warn: pc.yellow,
	error: pc.red,
};

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Prefix shown before each message. Default: `"rowbind"` */
	prefix?: string;
	/** Whether to include ISO timestamps. Default: `true` */
	timestamps?: boolean;
	/** Keys to redact from log data. Values replaced with "[REDACTED]". Default: password, token, secret */
	redactKeys?: string[];
}

/**
 * Create a console-based logger implementing `RowbindLogger`.
 *
 * @example
 * ```ts
 * import { createConsoleLogger } from "@rowbind/core";
 *
 * const logger = createConsoleLogger({ level: "debug" });
 * const dbMap = createDbMap({ dialect: "sqlite", driver, logger, trace: true });
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): RowbindLogger {
	const { level = "info", prefix = "rowbind", timestamps = true } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const redactKeys = buildRedactKeys(options.redactKeys);

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const parts: string[] = [];
		if (timestamps) {
			parts.push(pc.dim(new Date().toISOString()));
		}
		parts.push(LEVEL_COLOR[lvl](pc.bold(lvl.toUpperCase().padEnd(5))));
		parts.push(`[${prefix}]:`);
		parts.push(message);

		const line = parts.join(" ");
		const method = lvl === "error" ? "error" : lvl === "warn" ? "warn" : "log";

		const safeData = redactData(data, redactKeys);
		if (safeData && Object.keys(safeData).length > 0) {
			console[method](line, safeData);
		} else {
			console[method](line);
		}
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
