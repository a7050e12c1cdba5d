// =============================================================================
// FIELD ACCESSORS
// =============================================================================
// Read and write record properties by path. Embedded containers missing on the
// record are created from their class on write.

import type { RecordClass } from "../registry/fields.js";

export function getPath(record: object, path: readonly string[]): unknown {
	let current: unknown = record;
	for (const key of path) {
		if (typeof current !== "object" || current === null) return undefined;
		current = Reflect.get(current, key);
	}
	return current;
}

export function setPath(
	record: object,
	path: readonly string[],
	containers: readonly RecordClass[],
	value: unknown,
): void {
	let target: object = record;
	for (let i = 0; i < path.length - 1; i++) {
		const key = path[i] ?? "";
		let next: unknown = Reflect.get(target, key);
		if (typeof next !== "object" || next === null) {
			const Container = containers[i];
			next = Container ? new Container() : {};
			Reflect.set(target, key, next);
		}
		if (typeof next !== "object" || next === null) return;
		target = next;
	}
	const last = path[path.length - 1];
	if (last !== undefined) {
		Reflect.set(target, last, value);
	}
}
