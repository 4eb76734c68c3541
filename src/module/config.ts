/**
 * Engine configuration
 *
 * Usage:
 *   configure({ debug: true });
 *   configure({ defaultAnswer: new Returns(null) });
 *   resetConfig(); // back to defaults, e.g. in a beforeEach
 */

import { RETURNS_EMPTY } from "./answers";
import { setDebugEnabled } from "./helpers/logger";
import type { IAnswer } from "./types/mock";

export interface MockConfig {
	/** Print debug logs for mock creation, stubbing and verification */
	debug: boolean;
	/** Answer for unstubbed calls on mocks created without their own */
	defaultAnswer: IAnswer;
	/**
	 * Reject a call whose argument matchers don't cover every argument.
	 * When false the matchers are dropped with a warning and equality is used instead.
	 */
	strictMatchers: boolean;
}

const DEFAULT_CONFIG: Readonly<MockConfig> = Object.freeze({
	debug: false,
	defaultAnswer: RETURNS_EMPTY,
	strictMatchers: true,
});

let current: MockConfig = { ...DEFAULT_CONFIG };

export function configure(partial: Partial<MockConfig>): MockConfig {
	current = { ...current, ...partial };
	setDebugEnabled(current.debug);
	return getConfig();
}

export function getConfig(): MockConfig {
	return { ...current };
}

export function resetConfig(): void {
	current = { ...DEFAULT_CONFIG };
	setDebugEnabled(current.debug);
}
