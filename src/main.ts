/**
 * mockwork - Main Entry Point
 * Re-exports the public API
 */

// Module-level API (default context)
export * from "./module/mockwork";

// Verification modes
export { times, never, atLeast, atLeastOnce, atMost, Times, AtLeast, AtMost } from "./module/verification";

// Building blocks for custom matchers, answers and contexts
export { Equals, Any, ArgThat } from "./module/matchers";
export { Returns, ThrowsError, CallsFunction, ResolvesTo, RejectsWith, ReturnsEmpty, RETURNS_EMPTY } from "./module/answers";
export { Invocation } from "./module/invocation";
export { InvocationMatcher } from "./module/invocation-matcher";
export { InvocationContainer, StubbedInvocation } from "./module/invocation-container";
export { OngoingStubbing } from "./module/ongoing-stubbing";
export { MockingProgress } from "./module/mocking-progress";
export { MockHandler } from "./module/mock-handler";
export { ProxyMockMaker } from "./module/mock-maker";
export { MockingContext } from "./module/mocking-context";
export type { ValueTag } from "./module/mocking-context";

// Configuration, logging, errors
export { configure, getConfig, resetConfig } from "./module/config";
export type { MockConfig } from "./module/config";
export { logger } from "./module/helpers/logger";
export { MockError, MockCreationError, MockUsageError, AssertionFailure } from "./module/errors";

export type * from "./module/types/mock";
