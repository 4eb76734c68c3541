/**
 * Core interfaces for the mock engine
 * Capability interfaces are prefixed with I, matching the stub layer they grew from
 */

import type { Invocation } from "../invocation";
import type { InvocationMatcher } from "../invocation-matcher";

/** Any class that can be mocked */
export type Constructor<T = object> = abstract new (...args: never[]) => T;

/** The method part of a call: which type declared it, and its name */
export interface MethodSignature {
	readonly declaringType: string;
	readonly name: string;
}

/**
 * Predicate over one argument value
 * Any object with a matches() method can stand in, no base class required
 */
export interface IMatcher {
	matches(candidate: unknown): boolean;

	/** Short description used in failure messages */
	toString(): string;
}

/** Behavior bound to a stubbed call */
export interface IAnswer<T = unknown> {
	answer(invocation: Invocation): T;
}

/** What a verification mode receives: the wanted call and the call log */
export interface VerificationData {
	readonly wanted: InvocationMatcher;
	readonly invocations: readonly Invocation[];
}

/** Checks the call log against a wanted call, throwing AssertionFailure on mismatch */
export interface IVerificationMode {
	verify(data: VerificationData): void;
}

/** The single interception point every stand-in routes its calls to */
export interface IMockHandler {
	handle(invocation: Invocation): unknown;
}

/** Per-mock options accepted by mock() */
export interface MockOptions {
	/** Name used in messages (defaults to the class name, or "mock") */
	name?: string;
	/** Answer for calls that match no stub */
	defaultAnswer?: IAnswer;
}

/** What a MockMaker needs to build one stand-in */
export interface MockSettings<T> {
	readonly name: string;
	/** Class to inherit the method surface from; absent for interface mocks */
	readonly type?: Constructor<T>;
}

/**
 * Stand-in factory
 * Every method call on the returned instance must reach the handler
 */
export interface IMockMaker {
	createMock<T extends object>(settings: MockSettings<T>, handler: IMockHandler): T;
}
