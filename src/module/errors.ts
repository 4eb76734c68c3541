/**
 * Error taxonomy
 * Every error the engine raises on its own behalf extends MockError.
 * Errors configured with thenThrow()/thenReject() are never wrapped.
 */

/** Base class for engine errors */
export class MockError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * The requested type cannot be turned into a stand-in
 */
export class MockCreationError extends MockError {}

/**
 * The API was used out of protocol (misplaced matchers, when() without a
 * mock call, verify() on a plain object, ...)
 */
export class MockUsageError extends MockError {}

/**
 * A verification found a different number of matching calls than wanted
 */
export class AssertionFailure extends MockError {
	readonly actualCount: number;
	readonly expected: string;
	readonly wanted: string;

	constructor(actualCount: number, expected: string, wanted: string) {
		super(`Actual: ${actualCount}, expected: ${expected}`);
		this.actualCount = actualCount;
		this.expected = expected;
		this.wanted = wanted;
	}
}
