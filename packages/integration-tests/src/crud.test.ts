import {
	BatchOperationError,
	type DbMap,
	InvalidArgumentError,
	isOptimisticLockError,
	NotFoundError,
	OptimisticLockError,
	RegistrationError,
	TypeMismatchError,
} from "@rowbind/core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Audit, Invoice, Membership, Person, Sample } from "./records.js";
import { connectWithTables, createTestDatabase, type TestDatabase } from "./setup.js";

function invoice(memo: string, personId = 0): Invoice {
	const inv = new Invoice();
	inv.created = 1_700_000_000;
	inv.updated = 1_700_000_000;
	inv.memo = memo;
	inv.personId = personId;
	return inv;
}

function person(firstName: string, email: string): Person {
	const p = new Person();
	p.firstName = firstName;
	p.lastName = "Tester";
	p.email = email;
	return p;
}

/** Same columns as Invoice; each instance picks its table at run time. */
class RoutedInvoice extends Invoice {
	archived = false;

	tableName(): string {
		return this.archived ? "invoice_archive" : "invoice_live";
	}
}

describe("CRUD against SQLite", () => {
	let database: TestDatabase;
	let dbMap: DbMap;

	beforeEach(async () => {
		database = createTestDatabase();
		dbMap = await connectWithTables(database);
	});

	afterEach(async () => {
		await database.cleanup();
	});

	// =========================================================================
	// INSERT / GET / UPDATE
	// =========================================================================

	it("inserts, fetches and updates an invoice", async () => {
		const inv = invoice("first order");
		await dbMap.insert(inv);
		expect(inv.id).toBe(1);

		const loaded = await dbMap.get(Invoice, 1);
		expect(loaded.memo).toBe("first order");
		expect(loaded.created).toBe(1_700_000_000);
		expect(loaded.isPaid).toBe(false);

		loaded.memo = "revised";
		loaded.isPaid = true;
		expect(await dbMap.update(loaded)).toBe(1);

		const again = await dbMap.get(Invoice, 1);
		expect(again.memo).toBe("revised");
		expect(again.isPaid).toBe(true);
	});

	it("round-trips every column kind, including an embedded group", async () => {
		const sample = new Sample();
		sample.title = "Quarterly";
		sample.amount = 12.5;
		sample.views = 1234567890123n;
		sample.active = true;
		sample.payload = new Uint8Array([1, 2, 3]);
		sample.audit.createdBy = "tester";
		sample.audit.createdAt = new Date("2024-03-01T10:00:00.000Z");
		await dbMap.insert(sample);

		const loaded = await dbMap.get(Sample, sample.id);
		expect(loaded.title).toBe("Quarterly");
		expect(loaded.subtitle).toBeNull();
		expect(loaded.amount).toBe(12.5);
		expect(loaded.views).toBe(1234567890123n);
		expect(loaded.active).toBe(true);
		expect(Array.from(loaded.payload)).toEqual([1, 2, 3]);
		expect(loaded.audit).toBeInstanceOf(Audit);
		expect(loaded.audit.createdBy).toBe("tester");
		expect(loaded.audit.createdAt.toISOString()).toBe("2024-03-01T10:00:00.000Z");
	});

	it("assigns distinct auto-increment keys that Get can fetch", async () => {
		const a = invoice("a");
		const b = invoice("b");
		const c = invoice("c");
		await dbMap.insert(a, b, c);

		expect([a.id, b.id, c.id]).toEqual([1, 2, 3]);
		for (const inv of [a, b, c]) {
			const loaded = await dbMap.get(Invoice, inv.id);
			expect(loaded.memo).toBe(inv.memo);
		}
	});

	it("gets and updates a record with a composite key", async () => {
		const membership = new Membership();
		membership.groupId = 7;
		membership.userId = 42;
		membership.role = "owner";
		await dbMap.insert(membership);

		const loaded = await dbMap.get(Membership, 7, 42);
		expect(loaded.role).toBe("owner");

		loaded.role = "member";
		expect(await dbMap.update(loaded)).toBe(1);
		expect((await dbMap.get(Membership, 7, 42)).role).toBe("member");
		await expect(dbMap.get(Membership, 7)).rejects.toBeInstanceOf(InvalidArgumentError);
	});

	it("reports a missing row as NotFoundError and exists() as false", async () => {
		await expect(dbMap.get(Invoice, 99)).rejects.toBeInstanceOf(NotFoundError);
		expect(await dbMap.exists(Invoice, 99)).toBe(false);

		await dbMap.insert(invoice("present"));
		expect(await dbMap.exists(Invoice, 1)).toBe(true);
	});

	// =========================================================================
	// OPTIMISTIC LOCKING & HOOKS
	// =========================================================================

	it("rejects a stale update and leaves the row at version 2", async () => {
		const p = person("Ada", "ada@example.test");
		await dbMap.insert(p);
		expect(p.version).toBe(1);

		const first = await dbMap.get(Person, p.id);
		const second = await dbMap.get(Person, p.id);

		first.lastName = "Lovelace";
		expect(await dbMap.update(first)).toBe(1);
		expect(first.version).toBe(2);

		second.lastName = "Byron";
		const error = await dbMap.update(second).catch((e: unknown) => e);
		expect(error).toBeInstanceOf(OptimisticLockError);
		expect(isOptimisticLockError(error)).toBe(true);
		expect(error).toMatchObject({ table: "person_test", keys: [p.id], localVersion: 1 });
		expect(second.version).toBe(1);

		expect(await dbMap.selectInt("SELECT version FROM person_test WHERE id = ?", p.id)).toBe(2);
		expect((await dbMap.get(Person, p.id)).lastName).toBe("Lovelace");
	});

	it("runs preUpdate on the old version and postUpdate on the new one", async () => {
		const p = person("Grace", "grace@example.test");
		await dbMap.insert(p);

		p.lastName = "Hopper";
		await dbMap.update(p);

		expect(p.seen).toEqual(["preUpdate:1", "postUpdate:2"]);
	});

	it("guards deletes with the version column", async () => {
		const p = person("Alan", "alan@example.test");
		await dbMap.insert(p);
		const stale = await dbMap.get(Person, p.id);

		p.lastName = "Turing";
		await dbMap.update(p);

		await expect(dbMap.delete(stale)).rejects.toBeInstanceOf(OptimisticLockError);
		expect(await dbMap.delete(p)).toBe(1);
		expect(await dbMap.exists(Person, p.id)).toBe(false);
	});

	// =========================================================================
	// MULTI-RECORD CALLS
	// =========================================================================

	it("reports the failing position of a multi-record insert and keeps earlier rows", async () => {
		const a = person("A", "dup@example.test");
		const b = person("B", "dup@example.test");

		const error = await dbMap.insert(a, b).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(BatchOperationError);
		expect(error).toMatchObject({ index: 1, completed: 1 });
		expect(error).toHaveProperty("cause.code", "SQLITE_CONSTRAINT_UNIQUE");
		expect(a.id).toBe(1);
		expect(await dbMap.selectInt("SELECT count(*) FROM person_test")).toBe(1);
	});

	it("rejects records of different tables before running any SQL", async () => {
		await expect(
			dbMap.insert(invoice("x"), person("P", "p@example.test")),
		).rejects.toBeInstanceOf(TypeMismatchError);
		expect(await dbMap.selectInt("SELECT count(*) FROM invoice_test")).toBe(0);
	});

	// =========================================================================
	// REGISTRATION
	// =========================================================================

	it("maps one class to two tables and refuses a duplicate table name", async () => {
		const other = database.connect();
		const a = other.register(Invoice, "invoice_a");
		const b = other.register(Invoice, "invoice_b");
		expect(a).not.toBe(b);
		expect(() => other.register(Invoice, "invoice_a")).toThrow(RegistrationError);

		await other.createTables();
		await other.insert(invoice("goes to the first table"));

		expect(await other.selectInt("SELECT count(*) FROM invoice_a")).toBe(1);
		expect(await other.selectInt("SELECT count(*) FROM invoice_b")).toBe(0);
	});

	it("routes records through their tableName() method", async () => {
		const other = database.connect();
		other.register(RoutedInvoice, "invoice_live");
		other.register(RoutedInvoice, "invoice_archive");
		await other.createTables();

		const live = new RoutedInvoice();
		live.memo = "live";
		const archived = new RoutedInvoice();
		archived.memo = "old";
		archived.archived = true;
		await other.insert(live);
		await other.insert(archived);

		expect(await other.selectStr("SELECT memo FROM invoice_live")).toBe("live");
		expect(await other.selectStr("SELECT memo FROM invoice_archive")).toBe("old");
	});
});
