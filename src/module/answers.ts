/**
 * Answers - behaviors bound to stubbed calls
 *
 * Promise answers build their promise on each call, so a stubbed rejection
 * never exists (and never goes unhandled) before the code under test asks for it.
 */

import type { Invocation } from "./invocation";
import type { IAnswer } from "./types/mock";

export class Returns<T> implements IAnswer<T> {
	constructor(private readonly _value: T) {}

	answer(_invocation: Invocation): T {
		return this._value;
	}
}

export class ThrowsError implements IAnswer<never> {
	constructor(private readonly _error: unknown) {}

	answer(_invocation: Invocation): never {
		throw this._error;
	}
}

export class CallsFunction<T> implements IAnswer<T> {
	constructor(private readonly _fn: (invocation: Invocation) => T) {}

	answer(invocation: Invocation): T {
		return this._fn(invocation);
	}
}

export class ResolvesTo<T> implements IAnswer<Promise<Awaited<T>>> {
	constructor(private readonly _value: T) {}

	answer(_invocation: Invocation): Promise<Awaited<T>> {
		return Promise.resolve(this._value);
	}
}

export class RejectsWith implements IAnswer<Promise<never>> {
	constructor(private readonly _reason: unknown) {}

	answer(_invocation: Invocation): Promise<never> {
		return Promise.reject(this._reason);
	}
}

/**
 * Default for unstubbed calls: no value
 */
export class ReturnsEmpty implements IAnswer<undefined> {
	answer(_invocation: Invocation): undefined {
		return undefined;
	}
}

export const RETURNS_EMPTY: IAnswer<undefined> = new ReturnsEmpty();
