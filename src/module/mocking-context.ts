/**
 * MockingContext - one isolated set of mocks and the progress that drives them
 *
 * Usage:
 *   const ctx = new MockingContext();
 *   const registry = ctx.mock<Registry>("Registry");
 *   ctx.when(registry.lookup(ctx.anyString())).thenReturn("BasicDataSource");
 *   ctx.verify(registry, times(1)).lookup("datasource");
 *
 * The module-level API in mockwork.ts runs on a shared default context.
 */

import { getConfig } from "./config";
import { DEFAULT_MOCK_NAME, PLACEHOLDERS } from "./constants";
import { MockCreationError, MockUsageError } from "./errors";
import { debug } from "./helpers/logger";
import type { Invocation } from "./invocation";
import { Any, ArgThat, Equals } from "./matchers";
import { MockHandler } from "./mock-handler";
import { ProxyMockMaker } from "./mock-maker";
import { MockingProgress } from "./mocking-progress";
import { OngoingStubbing } from "./ongoing-stubbing";
import type {
	Constructor,
	IMatcher,
	IMockMaker,
	IVerificationMode,
	MockOptions,
	MockSettings,
} from "./types/mock";
import { times } from "./verification";

/** Primitive tags accepted by anyValueOf() */
export type ValueTag = keyof typeof PLACEHOLDERS | "object" | "function" | "symbol" | "undefined";

export class MockingContext {
	private readonly _handlers = new WeakMap<object, MockHandler>();

	constructor(
		private readonly _mockingProgress: MockingProgress = new MockingProgress(),
		private readonly _mockMaker: IMockMaker = new ProxyMockMaker(),
	) {}

	get mockingProgress(): MockingProgress {
		return this._mockingProgress;
	}

	/**
	 * Create a stand-in. Pass a class to mock its prototype methods, or
	 * a name (or nothing) to mock an interface
	 */
	mock<T extends object>(type?: Constructor<T> | string, options: MockOptions = {}): T {
		const settings = this.settingsFor(type, options);
		const handler = new MockHandler(this._mockingProgress, options.defaultAnswer ?? getConfig().defaultAnswer);
		const standIn = this._mockMaker.createMock<T>(settings, handler);
		this._handlers.set(standIn, handler);
		debug(`Created mock ${settings.name}`);
		return standIn;
	}

	/**
	 * Claim the stubbing started by the mock call passed in
	 */
	when<T>(methodCall: T): OngoingStubbing<T> {
		// The setup call may have replayed a stubbed rejection; nobody awaits it
		if (isThenable(methodCall)) {
			void methodCall.then(undefined, (reason: unknown) => debug("Setup call rejected", reason));
		}
		this._mockingProgress.stubbingStarted();
		const ongoing = this._mockingProgress.pullOngoingStubbing();
		if (!ongoing) {
			throw new MockUsageError(
				"when() requires an argument which has to be a method call on a mock, e.g. when(mock.lookup(\"name\"))",
			);
		}
		return new OngoingStubbing<T>(ongoing.invocationContainer);
	}

	/**
	 * Arm a verification; the next call on the returned mock is checked, not recorded
	 */
	verify<T extends object>(mock: T, mode: IVerificationMode = times(1)): T {
		this.handlerFor(mock, "verify");
		this._mockingProgress.verificationStarted(mode, mock);
		return mock;
	}

	isMock(value: unknown): boolean {
		return typeof value === "object" && value !== null && this._handlers.has(value);
	}

	/**
	 * Calls logged on a mock, oldest first (stubbing calls excluded)
	 */
	getInvocations(mock: object): readonly Invocation[] {
		return this.handlerFor(mock, "getInvocations").invocationContainer.invocations;
	}

	clearInvocations(...mocks: object[]): void {
		for (const mock of mocks) {
			this.handlerFor(mock, "clearInvocations").invocationContainer.clearInvocations();
		}
	}

	/**
	 * Forget both the calls and the stubs of the given mocks
	 */
	reset(...mocks: object[]): void {
		for (const mock of mocks) {
			this.handlerFor(mock, "reset").invocationContainer.reset();
		}
	}

	/** Fail on matchers reported outside a mock call */
	validateState(): void {
		this._mockingProgress.validateState();
	}

	/** Drop every pending matcher, verification and stubbing */
	resetProgress(): void {
		this._mockingProgress.reset();
	}

	// ========================================================================
	// Argument matchers
	// ========================================================================

	anyValueOf(type: "string"): string;
	anyValueOf(type: "number"): number;
	anyValueOf(type: "boolean"): boolean;
	anyValueOf(type: "bigint"): bigint;
	anyValueOf<T extends object>(type: Constructor<T>): T;
	anyValueOf(type: ValueTag): unknown;
	anyValueOf(type: ValueTag | Constructor): unknown {
		const placeholder = placeholderFor(type);
		this._mockingProgress.reportMatcher(new Any());
		return placeholder;
	}

	anyString(): string {
		return this.anyValueOf("string");
	}

	anyNumber(): number {
		return this.anyValueOf("number");
	}

	/** Matches anything; the placeholder is undefined */
	any(): undefined {
		this._mockingProgress.reportMatcher(new Any());
		return undefined;
	}

	equalsTo<T>(value: T): T {
		this._mockingProgress.reportMatcher(new Equals(value));
		return value;
	}

	/**
	 * Report a custom matcher (or predicate) and pass `placeholder` as the argument
	 */
	argThat<T>(matcher: IMatcher | ((candidate: unknown) => boolean), placeholder: T): T {
		this._mockingProgress.reportMatcher(typeof matcher === "function" ? new ArgThat(matcher) : matcher);
		return placeholder;
	}

	private handlerFor(mock: object, operation: string): MockHandler {
		const handler = this._handlers.get(mock);
		if (!handler) {
			throw new MockUsageError(`Argument passed to ${operation}() is not a mock created by this context`);
		}
		return handler;
	}

	private settingsFor<T>(type: Constructor<T> | string | undefined, options: MockOptions): MockSettings<T> {
		if (type === undefined || typeof type === "string") {
			return { name: options.name ?? type ?? DEFAULT_MOCK_NAME };
		}
		if (typeof type !== "function") {
			throw new MockCreationError(`Cannot mock ${String(type)}: expected a class or an interface name`);
		}
		return { name: options.name ?? (type.name || DEFAULT_MOCK_NAME), type };
	}
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
	return typeof value === "object" && value !== null && "then" in value && typeof value.then === "function";
}

function placeholderFor(type: ValueTag | Constructor): unknown {
	if (typeof type === "function") {
		return Object.create(type.prototype);
	}
	switch (type) {
		case "string":
		case "number":
		case "boolean":
		case "bigint":
			return PLACEHOLDERS[type];
		default:
			return undefined;
	}
}
