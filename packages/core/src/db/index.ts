export type { DialectName, IndexMethodClause, InsertKeyStrategy, SqlDialect } from "./dialect.js";
export {
	createMysqlDialect,
	getDialect,
	isDialectName,
	type MysqlDialectOptions,
	mysqlDialect,
	postgresDialect,
	sqliteDialect,
} from "./dialects/index.js";
export type { ExecResult, Row, SqlConnection, SqlDriver, SqlTransactionHandle } from "./driver.js";
export {
	getPoolStats,
	type PooledDriver,
	type PoolLike,
	type PoolStats,
	RECOMMENDED_POOL_CONFIG,
} from "./pool.js";
