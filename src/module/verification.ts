/**
 * Verification modes
 *
 * Usage:
 *   verify(registry, times(1)).lookup("datasource");
 *   verify(registry, never()).lookup("userstore");
 *   verify(registry, atLeast(2)).lookup(anyString());
 */

import { VERIFICATION_WORDING } from "./constants";
import { AssertionFailure, MockUsageError } from "./errors";
import { debug } from "./helpers/logger";
import type { IVerificationMode, VerificationData } from "./types/mock";

/**
 * Count the logged calls the wanted pattern accepts
 */
export function countMatching(data: VerificationData): number {
	return data.invocations.filter((invocation) => data.wanted.matches(invocation)).length;
}

function requireCount(count: number, helper: string): number {
	if (!Number.isInteger(count) || count < 0) {
		throw new MockUsageError(`${helper}() takes a non-negative integer, got ${count}`);
	}
	return count;
}

export class Times implements IVerificationMode {
	readonly wantedCount: number;

	constructor(wantedNumberOfInvocations: number) {
		this.wantedCount = requireCount(wantedNumberOfInvocations, "times");
	}

	verify(data: VerificationData): void {
		const actualCount = countMatching(data);
		debug(`Verifying ${data.wanted}: ${actualCount} of ${this.wantedCount}`);
		if (actualCount !== this.wantedCount) {
			throw new AssertionFailure(actualCount, String(this.wantedCount), data.wanted.toString());
		}
	}
}

export class AtLeast implements IVerificationMode {
	readonly minCount: number;

	constructor(minNumberOfInvocations: number) {
		this.minCount = requireCount(minNumberOfInvocations, "atLeast");
	}

	verify(data: VerificationData): void {
		const actualCount = countMatching(data);
		if (actualCount < this.minCount) {
			throw new AssertionFailure(
				actualCount,
				`${VERIFICATION_WORDING.AT_LEAST} ${this.minCount}`,
				data.wanted.toString(),
			);
		}
	}
}

export class AtMost implements IVerificationMode {
	readonly maxCount: number;

	constructor(maxNumberOfInvocations: number) {
		this.maxCount = requireCount(maxNumberOfInvocations, "atMost");
	}

	verify(data: VerificationData): void {
		const actualCount = countMatching(data);
		if (actualCount > this.maxCount) {
			throw new AssertionFailure(
				actualCount,
				`${VERIFICATION_WORDING.AT_MOST} ${this.maxCount}`,
				data.wanted.toString(),
			);
		}
	}
}

export function times(wantedNumberOfInvocations: number): IVerificationMode {
	return new Times(wantedNumberOfInvocations);
}

export function never(): IVerificationMode {
	return new Times(0);
}

export function atLeast(minNumberOfInvocations: number): IVerificationMode {
	return new AtLeast(minNumberOfInvocations);
}

export function atLeastOnce(): IVerificationMode {
	return new AtLeast(1);
}

export function atMost(maxNumberOfInvocations: number): IVerificationMode {
	return new AtMost(maxNumberOfInvocations);
}
