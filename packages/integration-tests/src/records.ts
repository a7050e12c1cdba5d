import { defineFields, field, type PostUpdateHook, type PreUpdateHook } from "@rowbind/core";

export class Invoice {
	id = 0;
	created = 0;
	updated = 0;
	memo = "";
	personId = 0;
	isPaid = false;

	static readonly tableName = "invoice_test";
	static readonly fields = defineFields<Invoice>({
		id: field.integer("id, primarykey, autoincrement"),
		created: field.integer("created"),
		updated: field.integer("updated"),
		memo: field.text("memo, size:200"),
		personId: field.integer("person_id"),
		isPaid: field.boolean("is_paid"),
	});
}

/** Records the version each update hook observes. */
export class Person implements PreUpdateHook, PostUpdateHook {
	id = 0;
	created = 0;
	updated = 0;
	firstName = "";
	lastName = "";
	email = "";
	version = 0;
	seen: string[] = [];

	static readonly tableName = "person_test";
	static readonly fields = defineFields<Person>({
		id: field.integer("id, primarykey, autoincrement"),
		created: field.integer("created"),
		updated: field.integer("updated"),
		firstName: field.text("first_name, size:80"),
		lastName: field.text("last_name, size:80"),
		email: field.text("email, size:120, unique"),
		version: field.integer("version, version"),
		seen: field.transient(),
	});

	preUpdate(): void {
		this.seen.push(`preUpdate:${this.version}`);
	}

	postUpdate(): void {
		this.seen.push(`postUpdate:${this.version}`);
	}
}

export class Audit {
	createdBy = "";
	createdAt = new Date(0);

	static readonly fields = defineFields<Audit>({
		createdBy: field.text("created_by, size:40"),
		createdAt: field.timestamp("created_at"),
	});
}

/** One column of every kind, plus an embedded group. */
export class Sample {
	id = 0;
	title = "";
	subtitle: string | null = null;
	amount = 0;
	views = 0n;
	active = false;
	payload: Uint8Array = new Uint8Array();
	audit = new Audit();

	static readonly tableName = "sample_test";
	static readonly fields = defineFields<Sample>({
		id: field.integer("id, primarykey, autoincrement"),
		title: field.text("title, size:100, notnull"),
		subtitle: field.text("subtitle", { nullable: true }),
		amount: field.float("amount"),
		views: field.bigint("views"),
		active: field.boolean("active"),
		payload: field.binary("payload"),
		audit: field.embedded(Audit),
	});
}

export class Membership {
	groupId = 0;
	userId = 0;
	role = "";

	static readonly tableName = "membership_test";
	static readonly fields = defineFields<Membership>({
		groupId: field.integer("group_id, primarykey"),
		userId: field.integer("user_id, primarykey"),
		role: field.text("role, size:20"),
	});
}

/** Ad hoc result type: bound from a join, never registered. */
export class InvoicePersonView {
	invoiceId = 0;
	memo = "";
	firstName = "";

	static readonly fields = defineFields<InvoicePersonView>({
		invoiceId: field.integer("invoice_id"),
		memo: field.text("memo"),
		firstName: field.text("first_name"),
	});
}
