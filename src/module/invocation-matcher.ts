/**
 * InvocationMatcher - an invocation paired with one matcher per argument
 *
 * Usage:
 *   const wanted = new InvocationMatcher(invocation); // Equals over each argument
 *   const anyName = new InvocationMatcher(invocation, [new Any()]);
 *   wanted.matches(laterInvocation);
 */

import type { Invocation } from "./invocation";
import { Equals } from "./matchers";
import type { IMatcher } from "./types/mock";

export class InvocationMatcher {
	readonly invocation: Invocation;
	readonly matchers: readonly IMatcher[];

	/**
	 * An empty matcher list means "equal to the invocation's own arguments"
	 */
	constructor(invocation: Invocation, matchers: readonly IMatcher[] = []) {
		this.invocation = invocation;
		this.matchers = Object.freeze(
			matchers.length === 0 ? InvocationMatcher.argumentsToMatchers(invocation.args) : [...matchers],
		);
		Object.freeze(this);
	}

	static argumentsToMatchers(args: readonly unknown[]): IMatcher[] {
		return args.map((arg) => new Equals(arg));
	}

	/**
	 * Same mock, same method, and every argument accepted by its matcher
	 */
	matches(candidate: Invocation): boolean {
		return this.invocation.isSameCallTarget(candidate) && this.hasMatchingArguments(candidate);
	}

	private hasMatchingArguments(candidate: Invocation): boolean {
		if (candidate.args.length !== this.matchers.length) {
			return false;
		}
		return this.matchers.every((matcher, i) => matcher.matches(candidate.args[i]));
	}

	toString(): string {
		const { declaringType, name } = this.invocation.method;
		return `${declaringType}.${name}(${this.matchers.map((m) => m.toString()).join(", ")})`;
	}
}
