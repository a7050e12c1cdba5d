// =============================================================================
// LIFECYCLE HOOKS
// =============================================================================
// Optional methods a record class may implement. The executor detects each one
// per record and awaits it with the executor running the operation (a DbMap or
// a Transaction), so hooks can issue further statements in the same scope.

import type { SqlExecutor } from "./executor.js";

type Hook = (executor: SqlExecutor) => void | Promise<void>;

export interface PreInsertHook {
	preInsert: Hook;
}
export interface PostInsertHook {
	postInsert: Hook;
}
export interface PreUpdateHook {
	preUpdate: Hook;
}
export interface PostUpdateHook {
	postUpdate: Hook;
}
export interface PreDeleteHook {
	preDelete: Hook;
}
export interface PostDeleteHook {
	postDelete: Hook;
}
/** Runs after Get, select and selectOne bind a row onto the record. */
export interface PostGetHook {
	postGet: Hook;
}

export type HookName =
	| "preInsert"
	| "postInsert"
	| "preUpdate"
	| "postUpdate"
	| "preDelete"
	| "postDelete"
	| "postGet";

export async function runHook(record: object, name: HookName, executor: SqlExecutor): Promise<void> {
	const hook: unknown = Reflect.get(record, name);
	if (typeof hook === "function") {
		await hook.call(record, executor);
	}
}
