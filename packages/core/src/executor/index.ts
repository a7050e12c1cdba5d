export { createDbMap, type DbMap } from "./db-map.js";
export type { ColumnFilter, SqlExecutor } from "./executor.js";
export type {
	HookName,
	PostDeleteHook,
	PostGetHook,
	PostInsertHook,
	PostUpdateHook,
	PreDeleteHook,
	PreInsertHook,
	PreUpdateHook,
} from "./hooks.js";
export type { Transaction } from "./transaction.js";
