/**
 * Argument matchers
 *
 * Usage:
 *   new Equals("datasource").matches("datasource"); // true
 *   new Any().matches(42); // true
 *   new ArgThat((v) => typeof v === "string" && v.startsWith("db"), "db*").matches("dbPool"); // true
 */

import type { IMatcher } from "./types/mock";

/**
 * Matches a value identical to the expected one (Object.is)
 */
export class Equals implements IMatcher {
	constructor(private readonly _wanted: unknown) {}

	get wanted(): unknown {
		return this._wanted;
	}

	matches(candidate: unknown): boolean {
		return Object.is(this._wanted, candidate);
	}

	toString(): string {
		return describeValue(this._wanted);
	}
}

/**
 * Matches anything, including undefined
 */
export class Any implements IMatcher {
	matches(_candidate: unknown): boolean {
		return true;
	}

	toString(): string {
		return "<any>";
	}
}

/**
 * Matches values accepted by a predicate
 */
export class ArgThat implements IMatcher {
	constructor(
		private readonly _predicate: (candidate: unknown) => boolean,
		private readonly _description = "<custom matcher>",
	) {}

	matches(candidate: unknown): boolean {
		return this._predicate(candidate);
	}

	toString(): string {
		return this._description;
	}
}

/**
 * Render a value for a failure message
 */
export function describeValue(value: unknown): string {
	switch (typeof value) {
		case "string":
			return JSON.stringify(value);
		case "bigint":
			return `${value}n`;
		case "function":
			return `[Function ${value.name || "anonymous"}]`;
		case "object":
			if (value === null) return "null";
			if (Array.isArray(value)) return `[Array(${value.length})]`;
			return `[${value.constructor?.name ?? "Object"}]`;
		default:
			return String(value);
	}
}
