/**
 * Tests for mocking-progress.ts
 */

import { MockUsageError } from "../../src/module/errors";
import { InvocationContainer } from "../../src/module/invocation-container";
import { Any, Equals } from "../../src/module/matchers";
import { MockingProgress } from "../../src/module/mocking-progress";
import { OngoingStubbing } from "../../src/module/ongoing-stubbing";
import { times } from "../../src/module/verification";

describe("MockingProgress", () => {
	let progress: MockingProgress;

	beforeEach(() => {
		progress = new MockingProgress();
	});

	describe("argument matchers", () => {
		it("should drain reported matchers in report order", () => {
			const first = new Any();
			const second = new Equals(2);
			progress.reportMatcher(first);
			progress.reportMatcher(second);

			expect(progress.pullLocalizedMatchers()).toEqual([first, second]);
			expect(progress.pullLocalizedMatchers()).toEqual([]);
		});
	});

	describe("ongoing stubbing", () => {
		it("should hand out the reported stubbing once", () => {
			const stubbing = new OngoingStubbing(new InvocationContainer());
			progress.reportOngoingStubbing(stubbing);

			expect(progress.pullOngoingStubbing()).toBe(stubbing);
			expect(progress.pullOngoingStubbing()).toBeNull();
		});

		it("should keep only the latest report", () => {
			const older = new OngoingStubbing(new InvocationContainer());
			const newer = new OngoingStubbing(new InvocationContainer());
			progress.reportOngoingStubbing(older);
			progress.reportOngoingStubbing(newer);

			expect(progress.pullOngoingStubbing()).toBe(newer);
		});
	});

	describe("verification", () => {
		it("should drain the mode only for the targeted mock", () => {
			const target = {};
			const other = {};
			const mode = times(1);
			progress.verificationStarted(mode, target);

			expect(progress.pullVerificationModeFor(other)).toBeNull();
			expect(progress.hasPendingVerification()).toBe(true);
			expect(progress.pullVerificationModeFor(target)).toBe(mode);
			expect(progress.pullVerificationModeFor(target)).toBeNull();
		});

		it("should discard a pending stubbing when verification starts", () => {
			progress.reportOngoingStubbing(new OngoingStubbing(new InvocationContainer()));
			progress.verificationStarted(times(1), {});

			expect(progress.pullOngoingStubbing()).toBeNull();
		});

		it("should reject matchers left over from outside a mock call", () => {
			progress.reportMatcher(new Any());

			expect(() => progress.verificationStarted(times(1), {})).toThrow(MockUsageError);
			expect(progress.hasPendingVerification()).toBe(false);
		});
	});

	describe("validateState", () => {
		it("should name the misplaced matchers and clear them", () => {
			progress.reportMatcher(new Any());
			progress.reportMatcher(new Equals("k"));

			expect(() => progress.validateState()).toThrow('Misplaced argument matcher(s) detected: <any>, "k"');
			expect(() => progress.validateState()).not.toThrow();
		});

		it("should run when stubbing starts", () => {
			progress.reportMatcher(new Any());

			expect(() => progress.stubbingStarted()).toThrow(MockUsageError);
		});
	});

	it("should clear every slot on reset", () => {
		progress.reportMatcher(new Any());
		progress.reportOngoingStubbing(new OngoingStubbing(new InvocationContainer()));
		progress.reset();
		progress.verificationStarted(times(1), {});
		progress.reset();

		expect(progress.pullLocalizedMatchers()).toEqual([]);
		expect(progress.pullOngoingStubbing()).toBeNull();
		expect(progress.hasPendingVerification()).toBe(false);
	});
});
