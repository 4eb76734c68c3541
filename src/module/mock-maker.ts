/**
 * ProxyMockMaker - builds stand-ins with the JavaScript Proxy
 *
 * Class mocks inherit the class prototype without running its constructor, and
 * intercept every method found on the prototype chain below Object.prototype.
 * Interface mocks have no class to read from, so every string property other
 * than IGNORED_PROPERTIES reads as a method.
 *
 * Reading the same property twice yields the same function.
 */

import { IGNORED_PROPERTIES } from "./constants";
import { MockCreationError } from "./errors";
import { Invocation, type RealMethod } from "./invocation";
import type { IMockHandler, IMockMaker, MethodSignature, MockSettings } from "./types/mock";

const ignored: ReadonlySet<string> = new Set<string>(IGNORED_PROPERTIES);

interface InterceptedMethod {
	readonly signature: MethodSignature;
	readonly realMethod?: RealMethod;
}

/**
 * Locate a method on the prototype chain, stopping before Object.prototype
 */
function findPrototypeMethod(prototype: object, name: string): InterceptedMethod | undefined {
	if (name === "constructor") return undefined;

	for (let owner: object | null = prototype; owner && owner !== Object.prototype; owner = Object.getPrototypeOf(owner)) {
		const descriptor = Object.getOwnPropertyDescriptor(owner, name);
		if (!descriptor) continue;
		const value: unknown = descriptor.value;
		if (typeof value !== "function") return undefined;
		const declaringType: unknown = Object.getOwnPropertyDescriptor(owner, "constructor")?.value;
		return {
			signature: {
				declaringType: typeof declaringType === "function" ? declaringType.name : "Object",
				name,
			},
			realMethod: function (this: unknown, ...args: unknown[]): unknown {
				return Reflect.apply(value, this, args);
			},
		};
	}
	return undefined;
}

export class ProxyMockMaker implements IMockMaker {
	createMock<T extends object>(settings: MockSettings<T>, handler: IMockHandler): T {
		const prototype = this.prototypeFor(settings);
		const methods = new Map<string, (...args: unknown[]) => unknown>();

		const resolveMethod = (name: string): InterceptedMethod | undefined => {
			if (settings.type) {
				return findPrototypeMethod(prototype, name);
			}
			if (ignored.has(name)) return undefined;
			return { signature: { declaringType: settings.name, name } };
		};

		try {
			const target: T = Object.create(prototype);
			const standIn: T = new Proxy(target, {
				get(obj, property, receiver) {
					if (typeof property !== "string") {
						return Reflect.get(obj, property, receiver);
					}

					const cached = methods.get(property);
					if (cached) return cached;

					const method = resolveMethod(property);
					if (!method) {
						return Reflect.get(obj, property, receiver);
					}

					const { signature, realMethod } = method;
					const intercepted = (...args: unknown[]): unknown =>
						handler.handle(new Invocation(standIn, signature, args, realMethod));
					Object.defineProperty(intercepted, "name", { value: property });
					methods.set(property, intercepted);
					return intercepted;
				},
			});
			return standIn;
		} catch (err) {
			throw new MockCreationError(`Cannot create a stand-in for ${settings.name}`, { cause: err });
		}
	}

	private prototypeFor<T>(settings: MockSettings<T>): object {
		const { type, name } = settings;
		if (!type) {
			return Object.prototype;
		}

		const prototype: unknown = type.prototype;
		if (typeof prototype !== "object" || prototype === null) {
			throw new MockCreationError(`Cannot mock ${name}: it has no prototype to inherit methods from`);
		}
		if (Object.isFrozen(prototype)) {
			throw new MockCreationError(`Cannot mock ${name}: its prototype is frozen`);
		}
		return prototype;
	}
}
