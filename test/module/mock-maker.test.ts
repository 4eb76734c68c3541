/**
 * Tests for mock-maker.ts
 * Uses a recording handler to observe what reaches the interception point
 */

import { MockCreationError } from "../../src/module/errors";
import type { Invocation } from "../../src/module/invocation";
import { ProxyMockMaker } from "../../src/module/mock-maker";
import type { IMockHandler } from "../../src/module/types/mock";
import { BaseRepository, ConnectionPool, type Registry } from "../fixtures/registry";

class RecordingHandler implements IMockHandler {
	readonly received: Invocation[] = [];

	constructor(private readonly _result: unknown = undefined) {}

	handle(invocation: Invocation): unknown {
		this.received.push(invocation);
		return this._result;
	}
}

describe("ProxyMockMaker", () => {
	const maker = new ProxyMockMaker();

	describe("interface mocks", () => {
		it("should route every method call to the handler", () => {
			const handler = new RecordingHandler("answer");
			const registry = maker.createMock<Registry>({ name: "Registry" }, handler);

			expect(registry.lookup("datasource")).toBe("answer");
			expect(handler.received).toHaveLength(1);
			expect(handler.received[0].mock).toBe(registry);
			expect(handler.received[0].method).toEqual({ declaringType: "Registry", name: "lookup" });
			expect(handler.received[0].args).toEqual(["datasource"]);
		});

		it("should return the same function for repeated property reads", () => {
			const registry = maker.createMock<Registry>({ name: "Registry" }, new RecordingHandler());

			expect(registry.lookup).toBe(registry.lookup);
			expect(registry.lookup.name).toBe("lookup");
		});

		it("should not be thenable", async () => {
			const registry = maker.createMock<Registry>({ name: "Registry" }, new RecordingHandler());

			expect("then" in registry).toBe(false);
			await expect(Promise.resolve(registry)).resolves.toBe(registry);
		});

		it("should leave symbol and ignored properties alone", () => {
			const handler = new RecordingHandler();
			const registry = maker.createMock<Registry>({ name: "Registry" }, handler);

			expect(Reflect.get(registry, Symbol.iterator)).toBeUndefined();
			expect(String(registry)).toBe("[object Object]");
			expect(handler.received).toHaveLength(0);
		});

		it("should refuse to call a real method", () => {
			const handler = new RecordingHandler();
			const registry = maker.createMock<Registry>({ name: "Registry" }, handler);
			registry.lookup("a");

			expect(() => handler.received[0].callRealMethod()).toThrow("the mock has no class implementation");
		});
	});

	describe("class mocks", () => {
		it("should inherit the class prototype without running the constructor", () => {
			const pool = maker.createMock({ name: "ConnectionPool", type: ConnectionPool }, new RecordingHandler());

			expect(pool).toBeInstanceOf(ConnectionPool);
			expect(pool).toBeInstanceOf(BaseRepository);
			expect(pool.opened).toBeUndefined();
			expect(pool.host).toBeUndefined();
		});

		it("should intercept own and inherited methods with their declaring type", () => {
			const handler = new RecordingHandler(7);
			const pool = maker.createMock({ name: "ConnectionPool", type: ConnectionPool }, handler);

			expect(pool.acquire(100)).toBe(7);
			expect(pool.count()).toBe(7);
			expect(handler.received.map((i) => i.method)).toEqual([
				{ declaringType: "ConnectionPool", name: "acquire" },
				{ declaringType: "BaseRepository", name: "count" },
			]);
		});

		it("should keep getters and Object members real", () => {
			const handler = new RecordingHandler();
			const pool = maker.createMock({ name: "ConnectionPool", type: ConnectionPool }, handler);

			expect(pool.label).toBe("pool");
			expect(pool.constructor).toBe(ConnectionPool);
			expect(pool.hasOwnProperty("host")).toBe(false);
			expect(handler.received).toHaveLength(0);
		});

		it("should call the real method against the stand-in", () => {
			const handler = new RecordingHandler();
			const pool = maker.createMock({ name: "ConnectionPool", type: ConnectionPool }, handler);
			pool.describe();

			expect(handler.received[0].callRealMethod()).toBe("pool(unset)");
		});

		it("should reject a function without a prototype", () => {
			const arrow = () => ({});
			const settings = { name: "arrow", type: Reflect.get({ arrow }, "arrow") };

			expect(() => maker.createMock(settings, new RecordingHandler())).toThrow(MockCreationError);
		});

		it("should reject a class with a frozen prototype", () => {
			class Sealed {
				run(): void {}
			}
			Object.freeze(Sealed.prototype);

			expect(() => maker.createMock({ name: "Sealed", type: Sealed }, new RecordingHandler())).toThrow(
				"Cannot mock Sealed: its prototype is frozen",
			);
		});
	});
});
