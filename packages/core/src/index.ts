// Engine
export * from "./executor/index.js";
export * from "./registry/index.js";

// Dialects & drivers
export * from "./db/index.js";

// Statements
export { type PreparedQuery, prepareQuery } from "./statement/named-params.js";

// Result binding
export type { ScalarKind, ScalarTypes } from "./binder/index.js";

// Errors
export * from "./error/index.js";

// Logging
export * from "./logger/index.js";

// Type definitions
export * from "./types/index.js";
