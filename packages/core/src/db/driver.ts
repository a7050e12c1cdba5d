// =============================================================================
// SQL DRIVER INTERFACE
// =============================================================================
// The connectivity capability the mapping engine runs through. Driver packages
// (Kysely, node-postgres) implement it; the engine never opens connections,
// prepares statements, or manages a pool itself.
//
// Implementations must acquire whatever connection they need per call and
// release it on every exit path, including failures.

export type Row = Record<string, unknown>;

export interface ExecResult {
	/** Rows inserted, updated or deleted by the statement. */
	rowsAffected: number;
	/** Key generated by the last INSERT, where the engine reports one. */
	insertId?: number | bigint;
}

export interface SqlConnection {
	/** Execute a statement that yields rows (SELECT, or DML with RETURNING). */
	query(sql: string, params: unknown[]): Promise<Row[]>;
	/** Execute an INSERT/UPDATE/DELETE/DDL statement. */
	execute(sql: string, params: unknown[]): Promise<ExecResult>;
}

/** One open transaction, pinned to a single connection until it ends. */
export interface SqlTransactionHandle extends SqlConnection {
	commit(): Promise<void>;
	rollback(): Promise<void>;
}

export interface SqlDriver extends SqlConnection {
	/** Identifier for logs, e.g. "kysely" or "pg". */
	id: string;
	begin(): Promise<SqlTransactionHandle>;
	/** Release pooled resources. Call during application shutdown. */
	close?(): Promise<void>;
}
