import { describe, expect, it } from "vitest";
import {
	RegistrationError,
	TableFrozenError,
	UnregisteredTypeError,
} from "../error/index.js";
import { defineFields, describeFields, field, isRecordClass, type FieldSet } from "../registry/fields.js";
import { createRegistry, type DynamicTable } from "../registry/registry.js";
import { parseTag } from "../registry/tag.js";
import { Doc, Note, PostTag, Stamp } from "./records.js";

describe("parseTag", () => {
	it("reads the column name and every flag", () => {
		expect(parseTag("id, primarykey, autoincrement, notnull, unique, version", "id")).toEqual({
			columnName: "id",
			transient: false,
			primaryKey: true,
			autoIncrement: true,
			maxSize: 0,
			notNull: true,
			unique: true,
			version: true,
		});
	});

	it("keeps the property name when the first token is empty", () => {
		const tag = parseTag(", size:64", "memo");
		expect(tag.columnName).toBeUndefined();
		expect(tag.maxSize).toBe(64);
	});

	it("treats '-' as transient", () => {
		expect(parseTag("-", "cache").transient).toBe(true);
	});

	it("matches directives case-insensitively", () => {
		expect(parseTag("id, PrimaryKey", "id").primaryKey).toBe(true);
	});

	it("rejects a bad size", () => {
		expect(() => parseTag("memo, size:abc", "memo")).toThrow(
			'Field "memo": invalid size directive "size:abc"',
		);
		expect(() => parseTag("memo, size:0", "memo")).toThrow(RegistrationError);
	});

	it("rejects unknown directives", () => {
		expect(() => parseTag("memo, indexed", "memo")).toThrow('Field "memo": unknown tag directive "indexed"');
	});
});

describe("describeFields", () => {
	it("flattens embedded classes into dotted paths", () => {
		const descriptors = describeFields(Doc);
		expect(descriptors.map((d) => d.path.join("."))).toEqual(["id", "stamp.by", "stamp.at", "draft"]);
		expect(descriptors.map((d) => d.columnName)).toEqual(["id", "created_by", "created_at", "draft"]);
		expect(descriptors[1]?.containers).toEqual([Stamp]);
		expect(descriptors[3]?.transient).toBe(true);
	});

	it("makes keys not-null and never nullable", () => {
		const [id, title, body] = describeFields(Note);
		expect(id).toMatchObject({ primaryKey: true, autoIncrement: true, notNull: true, nullable: false });
		expect(title).toMatchObject({ notNull: true, nullable: false, maxSize: 80 });
		expect(body).toMatchObject({ notNull: false, nullable: true });
	});

	it("returns the cached list on repeat calls", () => {
		expect(describeFields(Note)).toBe(describeFields(Note));
	});

	it("rejects a class that embeds itself", () => {
		class Loop {
			inner?: Loop;
			static readonly fields: FieldSet<Loop> = defineFields<Loop>({ inner: field.embedded(Loop) });
		}
		expect(() => describeFields(Loop)).toThrow("Type Loop embeds itself");
	});

	it("rejects two fields mapped to one column", () => {
		class Dup {
			a = "";
			b = "";
			static readonly fields = defineFields<Dup>({
				a: field.text("name"),
				b: field.text("NAME"),
			});
		}
		expect(() => describeFields(Dup)).toThrow('Type Dup maps column "NAME" twice (a and b)');
	});

	it("rejects autoincrement on a non-integer field", () => {
		class BadKey {
			code = "";
			static readonly fields = defineFields<BadKey>({ code: field.text("code, autoincrement") });
		}
		expect(() => describeFields(BadKey)).toThrow(
			'Field "code" of BadKey is autoincrement but not an integer column',
		);
	});

	it("recognizes record classes by their static fields", () => {
		expect(isRecordClass(Note)).toBe(true);
		expect(isRecordClass(Date)).toBe(false);
		expect(isRecordClass({ fields: {} })).toBe(false);
	});
});

describe("TableMap", () => {
	it("derives keys, version column and mapped columns from the tags", () => {
		const table = createRegistry().register(Note);
		expect(table.tableName).toBe("note");
		expect(table.keys.map((k) => k.columnName)).toEqual(["id"]);
		expect(table.autoIncrement).toBe(true);
		expect(table.versionColumn?.columnName).toBe("version");
		expect(table.mappedColumns.map((c) => c.columnName)).toEqual(["id", "title", "body", "version"]);
	});

	it("excludes transient fields from mapped columns", () => {
		const table = createRegistry().register(Doc);
		expect(table.mappedColumns.map((c) => c.fieldName)).toEqual(["id", "stamp.by", "stamp.at"]);
	});

	it("resolves a column by dotted path or by a unique property name", () => {
		const table = createRegistry().register(Doc);
		expect(table.columnMap("stamp.by").columnName).toBe("created_by");
		expect(table.columnMap("at").columnName).toBe("created_at");
		expect(() => table.columnMap("nope")).toThrow("No field nope mapped on Doc");
	});

	it("reads key values in key order", () => {
		const table = createRegistry().register(PostTag);
		const tag = new PostTag();
		tag.postId = 4;
		tag.label = "urgent";
		expect(table.keyValues(tag)).toEqual([4, "urgent"]);
		expect(table.autoIncrement).toBe(false);
	});

	it("replaces the key with setKeys", () => {
		const table = createRegistry().register(PostTag);
		table.setKeys(false, "label");
		expect(table.keys.map((k) => k.fieldName)).toEqual(["label"]);
		expect(table.columnMap("postId").primaryKey).toBe(false);
	});

	it("rejects an autoincrement key over several columns", () => {
		const table = createRegistry().register(PostTag);
		expect(() => table.setKeys(true, "postId", "label")).toThrow(
			"Table post_tag: an autoincrement key must be a single column, got 2",
		);
	});

	it("rejects a non-integer version column", () => {
		const table = createRegistry().register(Note);
		expect(() => table.setVersionCol("title")).toThrow(
			"Version column title of note must be an integer column",
		);
	});

	it("allows at most one version column", () => {
		class Revised {
			id = 0;
			rev = 0;
			edits = 0;
			static readonly fields = defineFields<Revised>({
				id: field.integer("id, primarykey"),
				rev: field.integer("rev, version"),
				edits: field.integer("edits, version"),
			});
		}
		expect(() => createRegistry().register(Revised, "revised")).toThrow(
			"Table revised declares 2 version columns; at most one is allowed",
		);
		expect(() => createRegistry().register(Revised, "revised")).toThrow(RegistrationError);
	});

	it("allows at most one autoincrement column", () => {
		class Sequenced {
			id = 0;
			seq = 0;
			static readonly fields = defineFields<Sequenced>({
				id: field.integer("id, primarykey, autoincrement"),
				seq: field.integer("seq, autoincrement"),
			});
		}
		expect(() => createRegistry().register(Sequenced, "sequenced")).toThrow(
			"Table sequenced declares 2 autoincrement columns; at most one is allowed",
		);
		expect(() => createRegistry().register(Sequenced, "sequenced")).toThrow(RegistrationError);
	});

	it("refuses to make the key transient", () => {
		const table = createRegistry().register(Note);
		expect(() => table.columnMap("id").setTransient(true)).toThrow("Primary key id cannot be transient");
	});

	it("rejects a rename onto a column name already in use", () => {
		const table = createRegistry().register(Note);
		expect(() => table.columnMap("title").rename("BODY")).toThrow(
			"Column name BODY is already used by body on note",
		);
		table.columnMap("title").rename("headline");
		expect(table.columnMap("title").columnName).toBe("headline");
	});

	it("records unique groups and indexes", () => {
		const table = createRegistry().register(PostTag);
		table.setUniqueTogether("label", "weight").addIndex("idx_weight", ["weight"], { method: "btree" });
		expect(table.uniqueTogether.map((g) => g.map((c) => c.columnName))).toEqual([["label", "weight"]]);
		expect(table.indexes).toMatchObject([{ name: "idx_weight", method: "btree", unique: false }]);
		expect(() => table.addIndex("idx_weight", ["label"])).toThrow(
			"Index idx_weight already exists on post_tag",
		);
		expect(() => table.setUniqueTogether("label")).toThrow("setUniqueTogether needs at least two fields");
	});

	it("refuses every mutation once frozen", () => {
		const table = createRegistry().register(Note);
		table.freeze();
		expect(table.isFrozen).toBe(true);
		expect(() => table.setKeys(false, "id")).toThrow(TableFrozenError);
		expect(() => table.setTableName("notes")).toThrow(
			'Table "note" cannot be renamed: it is frozen once used by a query or DDL call',
		);
		expect(() => table.columnMap("body").setMaxSize(10)).toThrow(TableFrozenError);
		expect(() => table.addIndex("idx", ["title"])).toThrow(TableFrozenError);
	});
});

describe("createRegistry", () => {
	it("falls back to the static tableName", () => {
		const registry = createRegistry();
		expect(registry.register(Note).tableName).toBe("note");
		expect(registry.register(Note, "note_archive").tableName).toBe("note_archive");
	});

	it("requires a table name", () => {
		class Nameless {
			id = 0;
			static readonly fields = defineFields<Nameless>({ id: field.integer("id, primarykey") });
		}
		expect(() => createRegistry().register(Nameless)).toThrow(
			"No table name for Nameless: pass one to register() or declare a static tableName",
		);
	});

	it("keeps table names unique per schema", () => {
		const registry = createRegistry();
		registry.register(Note);
		expect(() => registry.register(PostTag, "note")).toThrow("Table note is already registered for Note");
		expect(registry.register(PostTag, "note", "archive").schemaName).toBe("archive");
	});

	it("scopes names to one registry", () => {
		createRegistry().register(Note);
		expect(() => createRegistry().register(Note)).not.toThrow();
	});

	it("guards renames against clashes", () => {
		const registry = createRegistry();
		registry.register(Note);
		const tags = registry.register(PostTag);
		expect(() => tags.setTableName("note")).toThrow(RegistrationError);
	});

	it("resolves instances to the first table of their class", () => {
		const registry = createRegistry();
		const first = registry.register(Note, "note_a");
		registry.register(Note, "note_b");
		expect(registry.tableFor(new Note())).toBe(first);
		expect(registry.tableForType(Note)).toBe(first);
		expect(registry.table("note_b")?.tableName).toBe("note_b");
		expect(registry.tables().map((t) => t.tableName)).toEqual(["note_a", "note_b"]);
	});

	it("routes DynamicTable records by their own table name", () => {
		class ShardedNote extends Note implements DynamicTable {
			shard = "a";
			tableName() {
				return `note_${this.shard}`;
			}
		}
		const registry = createRegistry();
		registry.register(ShardedNote, "note_a");
		const routed = registry.register(ShardedNote, "note_b");
		const record = new ShardedNote();
		record.shard = "b";
		expect(registry.tableFor(record)).toBe(routed);
		record.shard = "c";
		expect(() => registry.tableFor(record)).toThrow("No table registered for type ShardedNote (table note_c)");
	});

	it("rejects unregistered types", () => {
		const registry = createRegistry();
		expect(() => registry.tableFor(new Note())).toThrow(UnregisteredTypeError);
		expect(() => registry.tableForType(Note)).toThrow("No table registered for type Note");
		expect(registry.lookupType(Note)).toBeUndefined();
	});
});
