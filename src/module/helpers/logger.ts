/**
 * Centralized Logger
 * Standardized console logging for the mock engine
 */

import { LIBRARY_ID } from "../constants";

/** Logger configuration */
interface LoggerConfig {
	/** Whether debug logging is enabled (toggled through configure()) */
	debugEnabled: boolean;
}

const config: LoggerConfig = {
	debugEnabled: false,
};

/**
 * Format a log message with library prefix
 */
function formatMessage(message: string): string {
	return `[${LIBRARY_ID}] ${message}`;
}

/**
 * Log a debug message (only when debug mode is enabled)
 */
export function debug(message: string, ...args: unknown[]): void {
	if (!config.debugEnabled) return;
	console.debug(formatMessage(message), ...args);
}

/**
 * Log a warning message
 */
export function warn(message: string, ...args: unknown[]): void {
	console.warn(formatMessage(message), ...args);
}

/**
 * Enable or disable debug logging
 */
export function setDebugEnabled(enabled: boolean): void {
	config.debugEnabled = enabled;
}

/**
 * Check if debug logging is enabled
 */
export function isDebugEnabled(): boolean {
	return config.debugEnabled;
}

/**
 * Logger namespace object for convenience
 */
export const logger = {
	debug,
	warn,
	setDebugEnabled,
	isDebugEnabled,
};

export default logger;
