/**
 * InvocationContainer - per-mock call log and stub table
 *
 * Usage:
 *   container.setInvocationForPotentialStubbing(matcher); // logged, tentatively stubbable
 *   container.addAnswer(new Returns("value"));            // un-logged, now a stub
 *   container.findAnswerFor(invocation);                  // latest matching stub
 */

import { MockUsageError } from "./errors";
import type { Invocation } from "./invocation";
import type { InvocationMatcher } from "./invocation-matcher";
import type { IAnswer } from "./types/mock";

/**
 * One stub: a call pattern and its answers, consumed in order with the last one repeating
 */
export class StubbedInvocation implements IAnswer {
	private readonly _answers: IAnswer[];

	constructor(
		readonly matcher: InvocationMatcher,
		answer: IAnswer,
	) {
		this._answers = [answer];
	}

	addAnswer(answer: IAnswer): void {
		this._answers.push(answer);
	}

	answer(invocation: Invocation): unknown {
		const next = this._answers.length > 1 ? this._answers.shift() : this._answers[0];
		return next?.answer(invocation);
	}

	matches(invocation: Invocation): boolean {
		return this.matcher.matches(invocation);
	}
}

export class InvocationContainer {
	private _invocations: Invocation[] = [];
	private _stubbed: StubbedInvocation[] = [];
	private _invocationForStubbing: InvocationMatcher | null = null;

	/**
	 * Log a call and remember it as the one the next answer would stub
	 */
	setInvocationForPotentialStubbing(invocationMatcher: InvocationMatcher): void {
		this._invocations.push(invocationMatcher.invocation);
		this._invocationForStubbing = invocationMatcher;
	}

	/**
	 * Turn the tentative call into a stub; the call itself leaves the log
	 */
	addAnswer(answer: IAnswer): StubbedInvocation {
		const pending = this._invocationForStubbing;
		if (!pending) {
			throw new MockUsageError(
				"No stubbing in progress: attach an answer right after when(mock.method(...))",
			);
		}

		const index = this._invocations.lastIndexOf(pending.invocation);
		if (index !== -1) {
			this._invocations.splice(index, 1);
		}
		const stub = new StubbedInvocation(pending, answer);
		this._stubbed.push(stub);
		this._invocationForStubbing = null;
		return stub;
	}

	/**
	 * Latest registered stub whose pattern matches the call, if any
	 */
	findAnswerFor(invocation: Invocation): StubbedInvocation | undefined {
		for (let i = this._stubbed.length - 1; i >= 0; i--) {
			if (this._stubbed[i].matches(invocation)) {
				return this._stubbed[i];
			}
		}
		return undefined;
	}

	/**
	 * Logged calls, oldest first
	 */
	get invocations(): readonly Invocation[] {
		return Object.freeze([...this._invocations]);
	}

	get stubbed(): readonly StubbedInvocation[] {
		return Object.freeze([...this._stubbed]);
	}

	hasStubbingInProgress(): boolean {
		return this._invocationForStubbing !== null;
	}

	clearInvocations(): void {
		this._invocations = [];
	}

	reset(): void {
		this._invocations = [];
		this._stubbed = [];
		this._invocationForStubbing = null;
	}
}
