import { describe, expect, it, vi } from 'vitest';

import type { ShellyCredentials, ShellyDevice } from './types.js';
import { ShellyAuthController } from './auth-controller.js';
import { ShellyStatusFeed } from './status-feed.js';
import type { FakeRoute } from './test-helpers.js';
import { basicHeader, createEngine } from './test-helpers.js';

const device: ShellyDevice = {
	id: 'shelly-office',
	name: 'Office Dimmer',
	host: '192.168.1.60',
	credentials: { username: 'reader', password: 'reader-secret' },
};

const writer: ShellyCredentials = { username: 'admin', password: 'test-secret' };

function setup(routes: Record<string, FakeRoute>, feed?: ShellyStatusFeed) {
	const engine = createEngine(routes);
	const controller = new ShellyAuthController(device, writer, {
		reader: engine.reader,
		writer: engine.writer,
		reporter: engine.reporter,
		feed,
		logger: engine.log,
	});
	return { ...engine, controller };
}

describe('ShellyAuthController', () => {
	it('starts out unknown', () => {
		const { controller } = setup({});

		expect(controller.authState).toBe('unknown');
	});

	it('polls on attach when there is no feed', async () => {
		const { controller, calls } = setup({
			'GET /shelly': { status: 200, body: { gen: 2, auth_en: true } },
		});

		await expect(controller.attach()).resolves.toBe('enabled');
		expect(controller.authState).toBe('enabled');
		expect(calls).toHaveLength(1);
	});

	it('stays unknown when the device cannot be reached', async () => {
		const { controller } = setup({});

		await expect(controller.attach()).resolves.toBe('unknown');
		expect(controller.authState).toBe('unknown');
	});

	it('follows feed updates after attach', async () => {
		const feed = new ShellyStatusFeed();
		feed.publish({ auth_en: true });
		const { controller, calls } = setup({}, feed);
		const listener = vi.fn();
		controller.onStateChange(listener);

		await controller.attach();
		expect(controller.authState).toBe('enabled');

		feed.publish({ auth_en: false });
		await vi.waitFor(() => {
			expect(controller.authState).toBe('disabled');
		});

		expect(calls).toHaveLength(0);
		expect(listener).toHaveBeenNthCalledWith(1, 'enabled', 'unknown');
		expect(listener).toHaveBeenNthCalledWith(2, 'disabled', 'enabled');
	});

	it('ignores the feed after detach', async () => {
		const feed = new ShellyStatusFeed();
		feed.publish({ auth: true });
		const { controller } = setup({}, feed);

		await controller.attach();
		controller.detach();
		feed.publish({ auth: false });
		await Promise.resolve();

		expect(controller.authState).toBe('enabled');
	});

	it('applies a successful write to its state', async () => {
		const { controller, calls } = setup({
			'GET /shelly': { status: 200, body: { gen: 2 } },
			'POST /rpc/Sys.SetAuth': { status: 200, body: null },
		});

		await expect(controller.setAuth(true)).resolves.toBe(true);

		expect(controller.authState).toBe('enabled');
		expect(calls[1].body).toEqual({ user: 'admin', pass: 'test-secret' });
	});

	it('keeps a stale state when a write fails', async () => {
		const { controller } = setup({
			'GET /shelly': { status: 200, body: { gen: 2, auth_en: true } },
			'POST /rpc/Sys.SetAuth': { status: 500 },
		});

		await controller.attach();
		await expect(controller.setAuth(false)).resolves.toBe(false);

		expect(controller.authState).toBe('enabled');
	});

	it('describes connectivity with the reader credentials', async () => {
		const { controller, calls } = setup({
			'GET /shelly': { status: 200, body: { gen: 1 } },
			'GET /settings': { status: 200, body: { coiot: { peer: '' } } },
		});

		await expect(controller.describeConnectivity()).resolves.toEqual({
			generation: 'gen1',
			descriptor: 'multicast',
		});
		expect(calls[1].headers.Authorization).toBe(basicHeader('reader', 'reader-secret'));
	});
});
