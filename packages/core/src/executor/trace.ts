// =============================================================================
// SQL TRACING
// =============================================================================
// Wraps a driver connection so every statement can be logged with its
// parameters and duration. Tracing is switched at run time; connections
// wrapped earlier follow the switch.

import type { ExecResult, Row, SqlConnection } from "../db/driver.js";
import type { RowbindLogger, TraceOptions } from "../types/config.js";

const DEFAULT_SLOW_QUERY_MS = 200;

export interface Tracer {
	readonly enabled: boolean;
	on(logger: RowbindLogger): void;
	off(): void;
	wrap(connection: SqlConnection): SqlConnection;
}

export function createTracer(options: TraceOptions = {}): Tracer {
	const slowQueryMs = options.slowQueryMs ?? DEFAULT_SLOW_QUERY_MS;
	let logger: RowbindLogger | undefined;

	async function timed<R>(sql: string, params: unknown[], run: () => Promise<R>): Promise<R> {
		const log = logger;
		if (!log) return run();

		const start = performance.now();
		try {
			const result = await run();
			const durationMs = Math.round((performance.now() - start) * 100) / 100;
			log.debug("sql", { sql, params, durationMs });
			if (durationMs >= slowQueryMs) {
				log.warn("slow sql", { sql, params, durationMs, slowQueryMs });
			}
			return result;
		} catch (error) {
			const durationMs = Math.round((performance.now() - start) * 100) / 100;
			log.error("sql failed", {
				sql,
				params,
				durationMs,
				error: error instanceof Error ? error.message : String(error),
			});
			throw error;
		}
	}

	return {
		get enabled() {
			return logger !== undefined;
		},
		on(next) {
			logger = next;
		},
		off() {
			logger = undefined;
		},
		wrap(connection) {
			return {
				query: (sql: string, params: unknown[]): Promise<Row[]> =>
					timed(sql, params, () => connection.query(sql, params)),
				execute: (sql: string, params: unknown[]): Promise<ExecResult> =>
					timed(sql, params, () => connection.execute(sql, params)),
			};
		},
	};
}
