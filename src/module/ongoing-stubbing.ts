/**
 * OngoingStubbing - fluent handle returned by when()
 *
 * Usage:
 *   when(registry.lookup("datasource")).thenReturn("BasicDataSource");
 *   when(registry.lookup("flaky")).thenThrow(new Error("down")).thenReturn("up");
 *
 * The first then* call turns the pending call into a stub; each further one
 * queues another answer on that same stub.
 */

import { CallsFunction, RejectsWith, ResolvesTo, Returns, ThrowsError } from "./answers";
import { debug } from "./helpers/logger";
import type { Invocation } from "./invocation";
import type { InvocationContainer, StubbedInvocation } from "./invocation-container";
import type { IAnswer } from "./types/mock";

export class OngoingStubbing<T> {
	private _stub: StubbedInvocation | null = null;

	constructor(private readonly _invocationContainer: InvocationContainer) {}

	get invocationContainer(): InvocationContainer {
		return this._invocationContainer;
	}

	thenReturn(value: T): this {
		return this.register(new Returns(value));
	}

	thenThrow(error: unknown): this {
		return this.register(new ThrowsError(error));
	}

	/** For calls returning a promise: resolve it with `value` */
	thenResolve(value: Awaited<T>): this {
		return this.register(new ResolvesTo(value));
	}

	/** For calls returning a promise: reject it with `reason` */
	thenReject(reason: unknown): this {
		return this.register(new RejectsWith(reason));
	}

	thenAnswer(answer: IAnswer<T> | ((invocation: Invocation) => T)): this {
		return this.register(typeof answer === "function" ? new CallsFunction(answer) : answer);
	}

	private register(answer: IAnswer): this {
		if (this._stub) {
			this._stub.addAnswer(answer);
		} else {
			this._stub = this._invocationContainer.addAnswer(answer);
		}
		debug("Stub answer registered", answer.constructor.name);
		return this;
	}
}
