// src/shelly/types.ts

export const DEFAULT_USERNAME = 'admin';

export interface ShellyCredentials {
	username: string;
	password: string;
}

export interface ShellyDevice {
	id: string;
	name: string;
	host: string;

	// Per-device credentials, used for reading only
	credentials?: ShellyCredentials;
}

/**
 * Gen2 and Gen3 share the JSON-RPC API, so they are one class here.
 */
export type GenerationClass = 'gen1' | 'gen2';

/**
 * printf-style logger; the platform hands in the Homebridge log.
 */
export interface ShellyLogger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export function consoleLogger(prefix: string): ShellyLogger {
	return {
		debug: (...args: unknown[]) => console.debug(`[${prefix}]`, ...args),
		info: (...args: unknown[]) => console.info(`[${prefix}]`, ...args),
		warn: (...args: unknown[]) => console.warn(`[${prefix}]`, ...args),
		error: (...args: unknown[]) => console.error(`[${prefix}]`, ...args),
	};
}

/**
 * Request-level auth is only sent when both halves are present.
 */
export function basicAuthFor(credentials: ShellyCredentials | undefined): ShellyCredentials | undefined {
	if (!credentials || !credentials.username || !credentials.password) {
		return undefined;
	}
	return credentials;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}
