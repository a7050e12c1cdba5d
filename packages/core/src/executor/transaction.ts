// =============================================================================
// TRANSACTION
// =============================================================================
// The executor operations pinned to one driver transaction. Once committed or
// rolled back, every further call rejects with TransactionClosedError. A
// commit that fails leaves the transaction open for rollback only.

import type { SqlTransactionHandle } from "../db/driver.js";
import {
	type ClosedTransactionState,
	NestedTransactionError,
	TransactionClosedError,
} from "../error/index.js";
import { buildExecutorMethods, type ExecutorContext, type SqlExecutor } from "./executor.js";
import type { Tracer } from "./trace.js";

export interface Transaction extends SqlExecutor {
	/**
	 * False once the transaction has been committed or rolled back. Stays true
	 * after a failed commit, when only `rollback()` is accepted.
	 */
	readonly active: boolean;
	commit(): Promise<void>;
	rollback(): Promise<void>;
	/** Nesting is not supported; always rejects with NestedTransactionError. */
	begin(): Promise<never>;
	savepoint(name: string): Promise<void>;
	rollbackToSavepoint(name: string): Promise<void>;
	releaseSavepoint(name: string): Promise<void>;
}

type TransactionState = "active" | ClosedTransactionState;

export function createTransaction(
	ctx: ExecutorContext,
	handle: SqlTransactionHandle,
	tracer: Tracer,
): Transaction {
	let state: TransactionState = "active";
	const connection = tracer.wrap(handle);

	const assertActive = (): void => {
		if (state !== "active") throw new TransactionClosedError(state);
	};

	async function runSavepointCommand(sql: string): Promise<void> {
		assertActive();
		await connection.execute(sql, []);
	}

	const tx: Transaction = {
		...buildExecutorMethods(ctx, connection, () => tx, assertActive),

		get active() {
			return state === "active" || state === "commit failed";
		},

		async commit() {
			assertActive();
			state = "committing";
			try {
				await handle.commit();
			} catch (error) {
				state = "commit failed";
				throw error;
			}
			state = "committed";
		},

		async rollback() {
			if (state !== "active" && state !== "commit failed") throw new TransactionClosedError(state);
			state = "rolled back";
			await handle.rollback();
		},

		begin: () => Promise.reject(new NestedTransactionError()),

		savepoint: (name) => runSavepointCommand(ctx.dialect.savepoint(name)),
		rollbackToSavepoint: (name) => runSavepointCommand(ctx.dialect.rollbackToSavepoint(name)),
		releaseSavepoint: (name) => runSavepointCommand(ctx.dialect.releaseSavepoint(name)),
	};

	return tx;
}
