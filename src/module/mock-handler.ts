/**
 * MockHandler - the invocation protocol
 *
 * Every call on a stand-in lands in handle(). In order:
 *   1. a verification armed for this mock → verify against the log, return undefined
 *   2. anything else (code under test, or a call inside when()) → log it, offer it
 *      for stubbing, and answer from the latest matching stub or the default answer
 */

import { getConfig } from "./config";
import { MockUsageError } from "./errors";
import { debug, isDebugEnabled, warn } from "./helpers/logger";
import type { Invocation } from "./invocation";
import { InvocationContainer } from "./invocation-container";
import { InvocationMatcher } from "./invocation-matcher";
import type { MockingProgress } from "./mocking-progress";
import { OngoingStubbing } from "./ongoing-stubbing";
import type { IAnswer, IMatcher, IMockHandler } from "./types/mock";

export class MockHandler implements IMockHandler {
	private readonly _invocationContainer = new InvocationContainer();

	constructor(
		private readonly _mockingProgress: MockingProgress,
		private readonly _defaultAnswer: IAnswer,
	) {}

	get invocationContainer(): InvocationContainer {
		return this._invocationContainer;
	}

	handle(invocation: Invocation): unknown {
		const verificationMode = this._mockingProgress.pullVerificationModeFor(invocation.mock);
		const invocationWithMatchers = this.bindMatchers(
			invocation,
			this._mockingProgress.pullLocalizedMatchers(),
		);

		if (verificationMode) {
			verificationMode.verify({
				wanted: invocationWithMatchers,
				invocations: this._invocationContainer.invocations,
			});
			return undefined;
		}

		this._invocationContainer.setInvocationForPotentialStubbing(invocationWithMatchers);
		this._mockingProgress.reportOngoingStubbing(new OngoingStubbing(this._invocationContainer));

		const stub = this._invocationContainer.findAnswerFor(invocation);
		if (!stub) {
			return this._defaultAnswer.answer(invocation);
		}
		if (isDebugEnabled()) {
			debug(`Answering ${invocation} from stub ${stub.matcher}`);
		}
		return stub.answer(invocation);
	}

	/**
	 * Reported matchers must cover the call's arguments one to one
	 */
	private bindMatchers(invocation: Invocation, matchers: IMatcher[]): InvocationMatcher {
		if (matchers.length > 0 && matchers.length !== invocation.args.length) {
			const message =
				`Invalid use of argument matchers in ${invocation}: ${invocation.args.length} argument(s) expected, ` +
				`${matchers.length} matcher(s) reported. Use a matcher for every argument (equalsTo() for literals)`;
			if (getConfig().strictMatchers) {
				throw new MockUsageError(message);
			}
			warn(message);
			return new InvocationMatcher(invocation);
		}
		return new InvocationMatcher(invocation, matchers);
	}
}
