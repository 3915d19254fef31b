import { afterEach, describe, expect, it, vi } from 'vitest';

import type { ShellyDevice } from './types.js';
import { ShellyStatusFeed, ShellyStatusPoller } from './status-feed.js';
import { basicHeader, createEngine, timeoutError } from './test-helpers.js';

const device: ShellyDevice = {
	id: 'shelly-attic',
	name: 'Attic Fan',
	host: '192.168.1.50',
	credentials: { username: 'reader', password: 'test-secret' },
};

describe('ShellyStatusFeed', () => {
	it('has no snapshot until something is published', () => {
		const feed = new ShellyStatusFeed();

		expect(feed.snapshot()).toBeUndefined();
	});

	it('exposes published keys and notifies subscribers', () => {
		const feed = new ShellyStatusFeed();
		const listener = vi.fn();
		feed.subscribe(listener);

		feed.publish({ auth_en: true, gen: 2 });

		expect(feed.snapshot()?.get('auth_en')).toBe(true);
		expect(feed.snapshot()?.get('missing')).toBeUndefined();
		expect(listener).toHaveBeenCalledTimes(1);
	});

	it('stops notifying after unsubscribe', () => {
		const feed = new ShellyStatusFeed();
		const listener = vi.fn();
		const unsubscribe = feed.subscribe(listener);

		unsubscribe();
		feed.publish({ auth: false });

		expect(listener).not.toHaveBeenCalled();
	});
});

describe('ShellyStatusPoller', () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it('publishes /shelly into the feed with reader credentials', async () => {
		const { transport, calls, log } = createEngine({
			'GET /shelly': { status: 200, body: { gen: 2, auth_en: false } },
		});
		const feed = new ShellyStatusFeed();
		const poller = new ShellyStatusPoller(device, feed, transport, 60_000, log);

		await expect(poller.refresh()).resolves.toBe(true);

		expect(feed.snapshot()?.get('auth_en')).toBe(false);
		expect(calls[0].headers.Authorization).toBe(basicHeader('reader', 'test-secret'));
	});

	it('keeps the previous snapshot when a refresh fails', async () => {
		const { transport, log } = createEngine({ 'GET /shelly': timeoutError() });
		const feed = new ShellyStatusFeed();
		feed.publish({ auth_en: true });
		const poller = new ShellyStatusPoller(device, feed, transport, 60_000, log);

		await expect(poller.refresh()).resolves.toBe(false);

		expect(feed.snapshot()?.get('auth_en')).toBe(true);
	});

	it('ignores non-200 answers', async () => {
		const { transport, log } = createEngine({ 'GET /shelly': { status: 401 } });
		const feed = new ShellyStatusFeed();
		const poller = new ShellyStatusPoller(device, feed, transport, 60_000, log);

		await expect(poller.refresh()).resolves.toBe(false);

		expect(feed.snapshot()).toBeUndefined();
	});

	it('refreshes on every interval until stopped', async () => {
		vi.useFakeTimers();
		const { transport, calls, log } = createEngine({
			'GET /shelly': { status: 200, body: { gen: 1, auth: true } },
		});
		const feed = new ShellyStatusFeed();
		const poller = new ShellyStatusPoller(device, feed, transport, 60_000, log);

		poller.start();

		await vi.advanceTimersByTimeAsync(120_000);
		expect(calls).toHaveLength(2);

		poller.stop();

		await vi.advanceTimersByTimeAsync(120_000);
		expect(calls).toHaveLength(2);
		expect(feed.snapshot()?.get('auth')).toBe(true);
	});
});
