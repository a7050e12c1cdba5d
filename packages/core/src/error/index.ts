import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";

export type RowbindErrorCode = BaseErrorCode;

export interface RowbindErrorOptions {
	cause?: unknown;
	details?: Record<string, unknown>;
}

export class RowbindError extends Error {
	readonly code: RowbindErrorCode;
	readonly details?: Record<string, unknown>;
	/**
	 * Whether this error is transient. Optimistic-lock conflicts and missing rows
	 * may resolve after the caller reloads; everything else will fail again.
	 */
	readonly transient: boolean;

	constructor(code: RowbindErrorCode, message?: string, options?: RowbindErrorOptions) {
		const raw = BASE_ERROR_CODES[code];
		super(message ?? raw.message, { cause: options?.cause });
		this.code = code;
		this.transient = raw.transient;
		this.details = options?.details;
		this.name = "RowbindError";
	}
}

/** Bad or conflicting metadata, raised while registering or configuring a table. */
export class RegistrationError extends RowbindError {
	constructor(message: string, details?: Record<string, unknown>) {
		super("REGISTRATION", message, { details });
		this.name = "RegistrationError";
	}
}

export class TableFrozenError extends RowbindError {
	constructor(table: string, mutation: string) {
		super(
			"TABLE_FROZEN",
			`Table "${table}" cannot ${mutation}: it is frozen once used by a query or DDL call`,
			{ details: { table, mutation } },
		);
		this.name = "TableFrozenError";
	}
}

export class UnregisteredTypeError extends RowbindError {
	constructor(typeName: string) {
		super("UNREGISTERED_TYPE", `No table registered for type ${typeName}`, {
			details: { type: typeName },
		});
		this.name = "UnregisteredTypeError";
	}
}

export class TypeMismatchError extends RowbindError {
	constructor(expected: string, actual: string, index: number) {
		super(
			"TYPE_MISMATCH",
			`Record ${index} maps to table "${actual}" but the call started with "${expected}"`,
			{ details: { expected, actual, index } },
		);
		this.name = "TypeMismatchError";
	}
}

/** Zero rows where exactly one was expected. */
export class NotFoundError extends RowbindError {
	constructor(message: string = BASE_ERROR_CODES.NOT_FOUND.message, details?: Record<string, unknown>) {
		super("NOT_FOUND", message, { details });
		this.name = "NotFoundError";
	}
}

export class MultipleRowsError extends RowbindError {
	constructor(count: number, details?: Record<string, unknown>) {
		super("MULTIPLE_ROWS", `Expected one row, got ${count}`, {
			details: { ...details, count },
		});
		this.name = "MultipleRowsError";
	}
}

/**
 * An UPDATE or DELETE guarded by a version column matched no row: either the
 * row is gone or another writer bumped its version first.
 */
export class OptimisticLockError extends RowbindError {
	readonly table: string;
	readonly keys: unknown[];
	readonly localVersion: number;

	constructor(table: string, keys: unknown[], localVersion: number) {
		super(
			"OPTIMISTIC_LOCK",
			`Optimistic lock failed on ${table} for key (${keys.map(String).join(", ")}) at version ${localVersion}`,
			{ details: { table, keys, localVersion } },
		);
		this.table = table;
		this.keys = keys;
		this.localVersion = localVersion;
		this.name = "OptimisticLockError";
	}
}

export class BindingError extends RowbindError {
	constructor(message: string, details?: Record<string, unknown>) {
		super("BINDING", message, { details });
		this.name = "BindingError";
	}
}

export class InvalidArgumentError extends RowbindError {
	constructor(message: string, details?: Record<string, unknown>) {
		super("INVALID_ARGUMENT", message, { details });
		this.name = "InvalidArgumentError";
	}
}

export class NestedTransactionError extends RowbindError {
	constructor() {
		super("NESTED_TRANSACTION");
		this.name = "NestedTransactionError";
	}
}

export type ClosedTransactionState = "committing" | "commit failed" | "committed" | "rolled back";

const CLOSED_MESSAGES: Record<ClosedTransactionState, string> = {
	committing: "Transaction is being committed",
	"commit failed": "Transaction commit failed; only rollback is allowed",
	committed: "Transaction has already been committed",
	"rolled back": "Transaction has already been rolled back",
};

export class TransactionClosedError extends RowbindError {
	constructor(state: ClosedTransactionState) {
		super("TRANSACTION_CLOSED", CLOSED_MESSAGES[state], {
			details: { state },
		});
		this.name = "TransactionClosedError";
	}
}

/**
 * Record `index` of a multi-record call failed. Records before it were written
 * and stay written; `cause` is the original error, untouched.
 */
export class BatchOperationError extends RowbindError {
	readonly index: number;
	readonly completed: number;

	constructor(operation: string, table: string, index: number, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super("BATCH_OPERATION", `${operation} on ${table} failed at record ${index}: ${reason}`, {
			cause,
			details: { operation, table, index },
		});
		this.index = index;
		this.completed = index;
		this.name = "BatchOperationError";
	}
}

export function isRowbindError(error: unknown): error is RowbindError {
	return error instanceof RowbindError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
	return error instanceof NotFoundError;
}

export function isOptimisticLockError(error: unknown): error is OptimisticLockError {
	return error instanceof OptimisticLockError;
}
