import {
	type DbMap,
	NestedTransactionError,
	TransactionClosedError,
} from "@rowbind/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Invoice } from "./records.js";
import { connectWithTables, createTestDatabase, type TestDatabase } from "./setup.js";

function invoice(memo: string): Invoice {
	const inv = new Invoice();
	inv.memo = memo;
	return inv;
}

const COUNT = "SELECT count(*) FROM invoice_test";

/**
 * Transaction tests. `writer` and `reader` are separate connections on one
 * database file, so uncommitted work is invisible to `reader`.
 */
describe("transactions against SQLite", () => {
	let database: TestDatabase;
	let writer: DbMap;
	let reader: DbMap;

	beforeEach(async () => {
		database = createTestDatabase();
		writer = await connectWithTables(database);
		reader = await connectWithTables(database);
	});

	afterEach(async () => {
		await database.cleanup();
	});

	it("hides uncommitted inserts from other connections until commit", async () => {
		const tx = await writer.begin();
		await tx.insert(invoice("pending"));

		expect(await tx.selectInt(COUNT)).toBe(1);
		expect(await reader.selectInt(COUNT)).toBe(0);

		await tx.commit();
		expect(await reader.selectInt(COUNT)).toBe(1);
	});

	it("discards work on rollback and refuses further use", async () => {
		const tx = await writer.begin();
		await tx.insert(invoice("discarded"));
		await tx.rollback();

		expect(tx.active).toBe(false);
		expect(await reader.selectInt(COUNT)).toBe(0);
		await expect(tx.insert(invoice("late"))).rejects.toBeInstanceOf(TransactionClosedError);
		await expect(tx.commit()).rejects.toBeInstanceOf(TransactionClosedError);
	});

	it("does not nest transactions", async () => {
		const tx = await writer.begin();
		await expect(tx.begin()).rejects.toBeInstanceOf(NestedTransactionError);
		await tx.rollback();
	});

	it("commits the callback form when the callback resolves", async () => {
		const id = await writer.transaction(async (tx) => {
			const inv = invoice("from callback");
			await tx.insert(inv);
			return inv.id;
		});

		expect(id).toBe(1);
		expect((await reader.get(Invoice, id)).memo).toBe("from callback");
	});

	it("rolls the callback form back when the callback rejects", async () => {
		await expect(
			writer.transaction(async (tx) => {
				await tx.insert(invoice("doomed"));
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");

		expect(await reader.selectInt(COUNT)).toBe(0);
	});

	it("rolls back to a savepoint", async () => {
		const tx = await writer.begin();
		await tx.insert(invoice("kept"));
		await tx.savepoint("before_second");
		await tx.insert(invoice("undone"));
		await tx.rollbackToSavepoint("before_second");
		await tx.releaseSavepoint("before_second");
		await tx.commit();

		expect(await reader.selectValues("string", "SELECT memo FROM invoice_test ORDER BY id")).toEqual([
			"kept",
		]);
	});
});
