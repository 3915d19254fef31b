// src/shelly/plugin-config.ts

import type { PlatformConfig } from 'homebridge';

import type { ShellyCredentials, ShellyDevice, ShellyLogger } from './types.js';
import { DEFAULT_USERNAME, isRecord } from './types.js';

export const DEFAULT_REFRESH_INTERVAL_S = 60;
export const MAX_REFRESH_INTERVAL_S = 86_400;

export interface ShellyDeviceConfig {
	/** Stable identifier; defaults to one derived from the host */
	id?: string;

	/** Name shown in Home app */
	name?: string;

	/** IP or resolvable hostname */
	host: string;

	/** Credentials used to read this device's state */
	username?: string;
	password?: string;
}

export interface ShellyAuthPlatformConfig extends PlatformConfig {
	/** Credentials applied when enabling or disabling auth on any device */
	username?: string;
	password?: string;

	/** Status feed refresh in seconds; 0 turns the feed off */
	refreshInterval?: number;

	devices?: ShellyDeviceConfig[];
}

export interface ResolvedPluginConfig {
	writer: ShellyCredentials;
	devices: ShellyDevice[];
	refreshIntervalMs: number;
}

function stringField(raw: Record<string, unknown>, key: string): string {
	const value = raw[key];
	return typeof value === 'string' ? value.trim() : '';
}

function resolveDevice(raw: Record<string, unknown>): ShellyDevice | null {
	const host = stringField(raw, 'host');
	if (!host) {
		return null;
	}

	const username = stringField(raw, 'username');
	// Passwords keep their whitespace
	const password = typeof raw.password === 'string' ? raw.password : '';

	return {
		id: stringField(raw, 'id') || `shelly-${host}`,
		name: stringField(raw, 'name') || `Shelly ${host}`,
		host,
		credentials: username || password ? { username, password } : undefined,
	};
}

/**
 * Whole seconds in [1, MAX_REFRESH_INTERVAL_S], or 0 when the feed is off.
 */
function resolveRefreshSeconds(value: unknown): number {
	if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
		return DEFAULT_REFRESH_INTERVAL_S;
	}
	if (value === 0) {
		return 0;
	}
	return Math.min(MAX_REFRESH_INTERVAL_S, Math.max(1, Math.round(value)));
}

/**
 * Turn the raw Homebridge platform block into device records plus the
 * installation-wide writer credentials.
 */
export function resolvePluginConfig(config: ShellyAuthPlatformConfig, log: ShellyLogger): ResolvedPluginConfig {
	const raw: Record<string, unknown> = config;

	const writer: ShellyCredentials = {
		username: stringField(raw, 'username') || DEFAULT_USERNAME,
		password: typeof raw.password === 'string' ? raw.password : '',
	};

	const refreshSeconds = resolveRefreshSeconds(raw.refreshInterval);

	const devices: ShellyDevice[] = [];
	const seenHosts = new Set<string>();
	const seenIds = new Set<string>();
	const entries = Array.isArray(raw.devices) ? raw.devices : [];

	for (const entry of entries) {
		if (!isRecord(entry)) {
			log.debug('Shelly: skipping malformed device entry in config');
			continue;
		}

		const device = resolveDevice(entry);
		if (!device) {
			log.debug(
				"Shelly: skipping device '%s' (no host in config)",
				stringField(entry, 'name') || 'Unknown',
			);
			continue;
		}

		if (seenHosts.has(device.host)) {
			log.debug('Shelly: skipping duplicate device entry for host %s', device.host);
			continue;
		}

		if (seenIds.has(device.id)) {
			log.debug('Shelly: skipping duplicate device id %s (host %s)', device.id, device.host);
			continue;
		}

		seenHosts.add(device.host);
		seenIds.add(device.id);
		devices.push(device);
	}

	return {
		writer,
		devices,
		refreshIntervalMs: refreshSeconds * 1000,
	};
}
