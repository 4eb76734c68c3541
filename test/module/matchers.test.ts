/**
 * Tests for matchers.ts
 */

import { Any, ArgThat, Equals, describeValue } from "../../src/module/matchers";

describe("Equals", () => {
	it("should match an identical primitive", () => {
		expect(new Equals("datasource").matches("datasource")).toBe(true);
		expect(new Equals(3).matches(3)).toBe(true);
	});

	it("should not match a different value", () => {
		expect(new Equals("datasource").matches("userstore")).toBe(false);
		expect(new Equals(3).matches("3")).toBe(false);
	});

	it("should compare objects by reference", () => {
		const config = { url: "db://local" };

		expect(new Equals(config).matches(config)).toBe(true);
		expect(new Equals(config).matches({ url: "db://local" })).toBe(false);
	});

	it("should treat NaN as equal to itself", () => {
		expect(new Equals(NaN).matches(NaN)).toBe(true);
	});

	it("should distinguish undefined from null", () => {
		expect(new Equals(undefined).matches(null)).toBe(false);
	});

	it("should describe the wanted value", () => {
		expect(new Equals("k").toString()).toBe('"k"');
		expect(new Equals(7).wanted).toBe(7);
	});
});

describe("Any", () => {
	it.each([["text"], [0], [null], [undefined], [{ nested: true }]])("should match %p", (value) => {
		expect(new Any().matches(value)).toBe(true);
	});

	it("should describe itself", () => {
		expect(new Any().toString()).toBe("<any>");
	});
});

describe("ArgThat", () => {
	it("should delegate to the predicate", () => {
		const startsWithDb = new ArgThat((v) => typeof v === "string" && v.startsWith("db"), "db*");

		expect(startsWithDb.matches("dbPool")).toBe(true);
		expect(startsWithDb.matches("cache")).toBe(false);
		expect(startsWithDb.toString()).toBe("db*");
	});

	it("should fall back to a generic description", () => {
		expect(new ArgThat(() => true).toString()).toBe("<custom matcher>");
	});
});

describe("describeValue", () => {
	it("should render values for messages", () => {
		expect(describeValue("a")).toBe('"a"');
		expect(describeValue(4)).toBe("4");
		expect(describeValue(BigInt(5))).toBe("5n");
		expect(describeValue(null)).toBe("null");
		expect(describeValue(undefined)).toBe("undefined");
		expect(describeValue([1, 2])).toBe("[Array(2)]");
		expect(describeValue(new Map())).toBe("[Map]");
		expect(describeValue(function named() {})).toBe("[Function named]");
	});
});
