/**
 * Module-level API
 * Thin wrappers over a shared default MockingContext, for tests that don't
 * need their own. Call resetMockingProgress() between tests so no pending
 * matcher, verification or stubbing leaks from one test into the next.
 */

import type { Invocation } from "./invocation";
import { MockingContext, type ValueTag } from "./mocking-context";
import type { OngoingStubbing } from "./ongoing-stubbing";
import type { Constructor, IMatcher, IVerificationMode, MockOptions } from "./types/mock";

const defaultContext = new MockingContext();

export function getDefaultContext(): MockingContext {
	return defaultContext;
}

export function resetMockingProgress(): void {
	defaultContext.resetProgress();
}

export function mock<T extends object>(type?: Constructor<T> | string, options?: MockOptions): T {
	return defaultContext.mock<T>(type, options);
}

export function when<T>(methodCall: T): OngoingStubbing<T> {
	return defaultContext.when(methodCall);
}

export function verify<T extends object>(mock: T, mode?: IVerificationMode): T {
	return defaultContext.verify(mock, mode);
}

export function isMock(value: unknown): boolean {
	return defaultContext.isMock(value);
}

export function getInvocations(mock: object): readonly Invocation[] {
	return defaultContext.getInvocations(mock);
}

export function clearInvocations(...mocks: object[]): void {
	defaultContext.clearInvocations(...mocks);
}

export function reset(...mocks: object[]): void {
	defaultContext.reset(...mocks);
}

export function validateMockingState(): void {
	defaultContext.validateState();
}

export function anyValueOf(type: "string"): string;
export function anyValueOf(type: "number"): number;
export function anyValueOf(type: "boolean"): boolean;
export function anyValueOf(type: "bigint"): bigint;
export function anyValueOf<T extends object>(type: Constructor<T>): T;
export function anyValueOf(type: ValueTag): unknown;
export function anyValueOf(type: ValueTag | Constructor): unknown {
	return typeof type === "function" ? defaultContext.anyValueOf(type) : defaultContext.anyValueOf(type);
}

export function anyString(): string {
	return defaultContext.anyString();
}

export function anyNumber(): number {
	return defaultContext.anyNumber();
}

export function any(): undefined {
	return defaultContext.any();
}

export function equalsTo<T>(value: T): T {
	return defaultContext.equalsTo(value);
}

export function argThat<T>(matcher: IMatcher | ((candidate: unknown) => boolean), placeholder: T): T {
	return defaultContext.argThat(matcher, placeholder);
}
