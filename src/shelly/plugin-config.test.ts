import { describe, expect, it } from 'vitest';

import type { PlatformConfig } from 'homebridge';

import { DEFAULT_REFRESH_INTERVAL_S, resolvePluginConfig } from './plugin-config.js';
import { createTestLogger } from './test-helpers.js';

function resolve(fields: Record<string, unknown>) {
	const log = createTestLogger();
	const config: PlatformConfig = { platform: 'ShellyAuth' };
	return { log, resolved: resolvePluginConfig(Object.assign(config, fields), log) };
}

describe('resolvePluginConfig', () => {
	it('applies defaults to an empty block', () => {
		const { resolved } = resolve({});

		expect(resolved).toEqual({
			writer: { username: 'admin', password: '' },
			devices: [],
			refreshIntervalMs: DEFAULT_REFRESH_INTERVAL_S * 1000,
		});
	});

	it('reads writer credentials and keeps password whitespace', () => {
		const { resolved } = resolve({ username: ' owner ', password: ' test-secret ' });

		expect(resolved.writer).toEqual({ username: 'owner', password: ' test-secret ' });
	});

	it('builds device records with derived ids and names', () => {
		const { resolved } = resolve({
			devices: [
				{ host: '192.168.1.20' },
				{
					id: 'porch',
					name: 'Porch Light',
					host: '192.168.1.21',
					username: 'reader',
					password: 'reader-secret',
				},
			],
		});

		expect(resolved.devices).toEqual([
			{
				id: 'shelly-192.168.1.20',
				name: 'Shelly 192.168.1.20',
				host: '192.168.1.20',
				credentials: undefined,
			},
			{
				id: 'porch',
				name: 'Porch Light',
				host: '192.168.1.21',
				credentials: { username: 'reader', password: 'reader-secret' },
			},
		]);
	});

	it('skips entries without a host and duplicate hosts', () => {
		const { resolved, log } = resolve({
			devices: [
				{ name: 'Nowhere' },
				{ host: '192.168.1.20', name: 'First' },
				{ host: '192.168.1.20', name: 'Second' },
				'not-an-object',
			],
		});

		expect(resolved.devices.map(d => d.name)).toEqual(['First']);
		expect(log.debug).toHaveBeenCalledWith("Shelly: skipping device '%s' (no host in config)", 'Nowhere');
		expect(log.debug).toHaveBeenCalledTimes(3);
	});

	it('skips a second entry reusing an id on another host', () => {
		const { resolved, log } = resolve({
			devices: [
				{ id: 'porch', host: '192.168.1.20', name: 'Porch' },
				{ id: 'porch', host: '192.168.1.21', name: 'Porch Copy' },
			],
		});

		expect(resolved.devices.map(d => d.host)).toEqual(['192.168.1.20']);
		expect(log.debug).toHaveBeenCalledWith(
			'Shelly: skipping duplicate device id %s (host %s)',
			'porch',
			'192.168.1.21',
		);
	});

	it.each([
		[0, 0],
		[30, 30_000],
		[-5, 60_000],
		['30', 60_000],
		[0.001, 1_000],
		[2.6, 3_000],
		[5_000_000, 86_400_000],
	])('turns refreshInterval %j into %d ms', (refreshInterval, expected) => {
		const { resolved } = resolve({ refreshInterval });

		expect(resolved.refreshIntervalMs).toBe(expected);
	});
});
