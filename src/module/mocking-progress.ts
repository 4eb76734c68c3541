/**
 * MockingProgress - what the next intercepted call means
 *
 * Holds three independent one-shot slots:
 *   - argument matchers reported by matcher helpers while the call's arguments are built
 *   - a verification mode set by verify(), for one specific mock
 *   - the ongoing stubbing reported by the last non-verifying call, claimed by when()
 *
 * One instance per MockingContext; never share one between concurrently running tests.
 */

import { MockUsageError } from "./errors";
import type { OngoingStubbing } from "./ongoing-stubbing";
import type { IMatcher, IVerificationMode } from "./types/mock";

/** A verification waiting for the next call on `mock` */
export interface PendingVerification {
	readonly mode: IVerificationMode;
	readonly mock: object;
}

export class MockingProgress {
	private _matcherStack: IMatcher[] = [];
	private _verification: PendingVerification | null = null;
	private _ongoingStubbing: OngoingStubbing<unknown> | null = null;

	reportMatcher(matcher: IMatcher): void {
		this._matcherStack.push(matcher);
	}

	/**
	 * Drain the matchers reported since the last call
	 */
	pullLocalizedMatchers(): IMatcher[] {
		if (this._matcherStack.length === 0) {
			return [];
		}
		const matchers = this._matcherStack;
		this._matcherStack = [];
		return matchers;
	}

	reportOngoingStubbing(ongoingStubbing: OngoingStubbing<unknown>): void {
		this._ongoingStubbing = ongoingStubbing;
	}

	pullOngoingStubbing(): OngoingStubbing<unknown> | null {
		const stubbing = this._ongoingStubbing;
		this._ongoingStubbing = null;
		return stubbing;
	}

	stubbingStarted(): void {
		this.validateState();
	}

	/**
	 * Arm a verification for the next call made on `mock`
	 */
	verificationStarted(mode: IVerificationMode, mock: object): void {
		this.validateState();
		this._ongoingStubbing = null;
		this._verification = { mode, mock };
	}

	/**
	 * Drain the pending verification if it targets `mock`; otherwise leave it armed
	 */
	pullVerificationModeFor(mock: object): IVerificationMode | null {
		const pending = this._verification;
		if (!pending || pending.mock !== mock) {
			return null;
		}
		this._verification = null;
		return pending.mode;
	}

	hasPendingVerification(): boolean {
		return this._verification !== null;
	}

	/**
	 * Matchers reported outside of a mock call can never be consumed correctly
	 */
	validateState(): void {
		if (this._matcherStack.length > 0) {
			const misplaced = this._matcherStack.map((m) => m.toString()).join(", ");
			this._matcherStack = [];
			throw new MockUsageError(
				`Misplaced argument matcher(s) detected: ${misplaced}. Matchers may only be used as arguments of a call on a mock`,
			);
		}
	}

	reset(): void {
		this._matcherStack = [];
		this._verification = null;
		this._ongoingStubbing = null;
	}
}
