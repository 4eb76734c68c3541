/**
 * Invocation - one intercepted call on a mock
 *
 * Created once per call by the mock maker and never modified afterwards.
 */

import { MockUsageError } from "./errors";
import { describeValue } from "./matchers";
import type { MethodSignature } from "./types/mock";

/** Runs the real prototype method for a call, when the mock has one */
export type RealMethod = (...args: unknown[]) => unknown;

export class Invocation {
	readonly mock: object;
	readonly method: MethodSignature;
	readonly args: readonly unknown[];
	private readonly _realMethod: RealMethod | undefined;

	constructor(mock: object, method: MethodSignature, args: readonly unknown[], realMethod?: RealMethod) {
		this.mock = mock;
		this.method = method;
		this.args = Object.freeze([...args]);
		this._realMethod = realMethod;
		Object.freeze(this);
	}

	/**
	 * Whether two invocations target the same method of the same mock
	 */
	isSameCallTarget(other: Invocation): boolean {
		return (
			this.mock === other.mock &&
			this.method.declaringType === other.method.declaringType &&
			this.method.name === other.method.name
		);
	}

	/**
	 * Run the class's own implementation with this call's arguments
	 */
	callRealMethod(): unknown {
		if (!this._realMethod) {
			throw new MockUsageError(
				`Cannot call real method ${this.method.declaringType}.${this.method.name}(): the mock has no class implementation`,
			);
		}
		return this._realMethod.apply(this.mock, [...this.args]);
	}

	toString(): string {
		return `${this.method.declaringType}.${this.method.name}(${this.args.map(describeValue).join(", ")})`;
	}
}
