import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { createDbMap, type DbMap, type DbMapOptions } from "@rowbind/core";
import { kyselyDriver } from "@rowbind/kysely-adapter";
import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";
import { Invoice, Membership, Person, Sample } from "./records.js";

/**
 * A temporary SQLite database file. Every `connect()` opens an independent
 * connection (its own Kysely instance) on the same file, which is what the
 * transaction-isolation tests need.
 */
export interface TestDatabase {
	connect(options?: Partial<Omit<DbMapOptions, "driver" | "dialect">>): DbMap;
	cleanup(): Promise<void>;
}

export function registerTestTables(dbMap: DbMap): void {
	dbMap.register(Invoice);
	dbMap.register(Person);
	dbMap.register(Sample);
	dbMap.register(Membership);
}

export function createTestDatabase(): TestDatabase {
	const dir = mkdtempSync(path.join(tmpdir(), "rowbind-"));
	const file = path.join(dir, "test.db");
	const opened: DbMap[] = [];

	return {
		connect(options = {}) {
			const db = new Kysely<unknown>({
				dialect: new SqliteDialect({ database: new SQLite(file) }),
			});
			const dbMap = createDbMap({ ...options, dialect: "sqlite", driver: kyselyDriver(db) });
			opened.push(dbMap);
			return dbMap;
		},

		async cleanup() {
			for (const dbMap of opened) {
				await dbMap.close();
			}
			rmSync(dir, { recursive: true, force: true });
		},
	};
}

/** Open a connection with the test tables registered and created. */
export async function connectWithTables(database: TestDatabase): Promise<DbMap> {
	const dbMap = database.connect();
	registerTestTables(dbMap);
	await dbMap.createTablesIfNotExists();
	return dbMap;
}
