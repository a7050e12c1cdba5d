import { InvalidArgumentError } from "../../error/index.js";
import type { DialectName, SqlDialect } from "../dialect.js";
import { mysqlDialect } from "./mysql.js";
import { postgresDialect } from "./postgres.js";
import { sqliteDialect } from "./sqlite.js";

export { createMysqlDialect, type MysqlDialectOptions, mysqlDialect } from "./mysql.js";
export { postgresDialect } from "./postgres.js";
export { sqliteDialect } from "./sqlite.js";

const BUILT_IN: Record<DialectName, SqlDialect> = {
	postgres: postgresDialect,
	mysql: mysqlDialect,
	sqlite: sqliteDialect,
};

export function isDialectName(name: string): name is DialectName {
	return Object.hasOwn(BUILT_IN, name);
}

/** Resolve a built-in dialect by name. */
export function getDialect(name: string): SqlDialect {
	if (!isDialectName(name)) {
		throw new InvalidArgumentError(
			`Unknown dialect "${name}". Expected one of: ${Object.keys(BUILT_IN).join(", ")}`,
			{ dialect: name },
		);
	}
	return BUILT_IN[name];
}
