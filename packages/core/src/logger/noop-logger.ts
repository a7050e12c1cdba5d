import type { RowbindLogger } from "../types/config.js";

const noop = () => {};

/** Default logger: discards everything. */
export const noopLogger: RowbindLogger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};
