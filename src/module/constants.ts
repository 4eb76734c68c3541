/**
 * Library Constants
 * Centralized constants for the mockwork engine
 */

/** Library ID / log prefix */
export const LIBRARY_ID = "mockwork";

/** Name given to interface mocks created without one */
export const DEFAULT_MOCK_NAME = "mock";

/**
 * Properties an interface mock never intercepts.
 * Promise resolution, JSON serialization, test-runner equality checks and
 * console inspection read these, and a stand-in must not answer them with
 * a mocked method.
 */
export const IGNORED_PROPERTIES = Object.freeze([
	"then",
	"constructor",
	"toJSON",
	"asymmetricMatch",
	"$$typeof",
	"nodeType",
	"toString",
	"valueOf",
	"inspect",
] as const);

/** Placeholder values returned by matcher helpers, keyed by `typeof` tag */
export const PLACEHOLDERS = Object.freeze({
	string: "",
	number: 0,
	boolean: false,
	bigint: BigInt(0),
} as const);

/** Verification wording used in assertion messages */
export const VERIFICATION_WORDING = Object.freeze({
	AT_LEAST: "at least",
	AT_MOST: "at most",
} as const);
