// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of every error code the mapping engine raises, with its default
// message and whether retrying the same operation may succeed.

export type RawErrorCode = {
	message: string;
	/**
	 * Whether this error is transient (retrying may succeed).
	 *
	 * - `true`: the row may change underneath the caller. Reload and retry.
	 * - `false` (default): the condition is permanent for the same input.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Transient errors: re-reading the row and retrying may succeed.
	NOT_FOUND: { message: "No rows in result set", transient: true },
	OPTIMISTIC_LOCK: { message: "Optimistic lock conflict", transient: true },

	// Deterministic errors: the same call will always fail.
	REGISTRATION: { message: "Invalid table registration", transient: false },
	TABLE_FROZEN: { message: "Table map is frozen after first use", transient: false },
	UNREGISTERED_TYPE: { message: "No table registered for type", transient: false },
	TYPE_MISMATCH: { message: "Records map to different tables", transient: false },
	MULTIPLE_ROWS: { message: "Expected one row, got several", transient: false },
	BINDING: { message: "Result columns do not match destination", transient: false },
	INVALID_ARGUMENT: { message: "Invalid argument", transient: false },
	NESTED_TRANSACTION: { message: "Nested transactions are not supported", transient: false },
	TRANSACTION_CLOSED: { message: "Transaction already committed or rolled back", transient: false },
	BATCH_OPERATION: { message: "Multi-record operation failed", transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;
