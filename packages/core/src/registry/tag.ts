// =============================================================================
// FIELD TAG PARSER
// =============================================================================
// A tag is a comma-separated directive list attached to one field:
//
//   "id, primarykey, autoincrement"
//   "memo, size:200, notnull"
//   "-"                              (transient: never mapped)
//
// The first token is the column name (empty keeps the property name).

import { RegistrationError } from "../error/index.js";

export interface ParsedTag {
	/** Explicit column name, when the first token is not empty. */
	columnName?: string;
	transient: boolean;
	primaryKey: boolean;
	autoIncrement: boolean;
	/** 0 when no size directive is present. */
	maxSize: number;
	notNull: boolean;
	unique: boolean;
	version: boolean;
}

const FLAG_DIRECTIVES = ["primarykey", "autoincrement", "notnull", "unique", "version"] as const;

type FlagDirective = (typeof FLAG_DIRECTIVES)[number];

function isFlagDirective(token: string): token is FlagDirective {
	return FLAG_DIRECTIVES.some((d) => d === token);
}

export function parseTag(tag: string, fieldName: string): ParsedTag {
	const [first = "", ...rest] = tag.split(",").map((token) => token.trim());

	const parsed: ParsedTag = {
		transient: first === "-",
		primaryKey: false,
		autoIncrement: false,
		maxSize: 0,
		notNull: false,
		unique: false,
		version: false,
	};
	if (first !== "" && first !== "-") {
		parsed.columnName = first;
	}

	for (const token of rest) {
		if (token === "") continue;
		const lower = token.toLowerCase();

		if (lower.startsWith("size:")) {
			const size = Number(token.slice("size:".length).trim());
			if (!Number.isInteger(size) || size <= 0) {
				throw new RegistrationError(`Field "${fieldName}": invalid size directive "${token}"`, {
					field: fieldName,
				});
			}
			parsed.maxSize = size;
			continue;
		}

		if (!isFlagDirective(lower)) {
			throw new RegistrationError(`Field "${fieldName}": unknown tag directive "${token}"`, {
				field: fieldName,
			});
		}

		switch (lower) {
			case "primarykey":
				parsed.primaryKey = true;
				break;
			case "autoincrement":
				parsed.autoIncrement = true;
				break;
			case "notnull":
				parsed.notNull = true;
				break;
			case "unique":
				parsed.unique = true;
				break;
			case "version":
				parsed.version = true;
				break;
		}
	}

	return parsed;
}
