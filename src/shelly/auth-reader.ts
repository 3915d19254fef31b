// src/shelly/auth-reader.ts

import type { ShellyDevice, ShellyLogger } from './types.js';
import { basicAuthFor, consoleLogger, isRecord } from './types.js';
import type { AuthState } from './auth-state.js';
import { authStateFromFlag } from './auth-state.js';
import type { GenerationDetector } from './generation.js';
import type { AuthSnapshotSource, StatusSnapshot } from './status-feed.js';
import type { ShellyTransport } from './transport.js';
import { READ_TIMEOUT_MS } from './transport.js';

// `auth_en` is what Gen2/3 devices report; Gen1 only has `auth`.
const AUTH_KEYS = ['auth_en', 'auth'] as const;

function firstPresent(lookup: (key: string) => unknown): unknown {
	for (const key of AUTH_KEYS) {
		const value = lookup(key);
		if (value !== undefined && value !== null) {
			return value;
		}
	}
	return undefined;
}

/**
 * Resolves whether a device currently has authentication turned on.
 *
 * A populated status feed answers without touching the network. Otherwise the
 * device is polled in its own dialect, and an HTTP 401 anywhere along the way
 * counts as "enabled": only a device with auth on can refuse us.
 */
export class AuthStateReader {
	private readonly log: ShellyLogger;

	constructor(
		private readonly transport: ShellyTransport,
		private readonly detector: GenerationDetector,
		logger?: ShellyLogger,
	) {
		this.log = logger ?? consoleLogger('shelly-read');
	}

	public fromSnapshot(snapshot: StatusSnapshot | undefined): AuthState | undefined {
		if (!snapshot) {
			return undefined;
		}

		const flag = firstPresent((key) => snapshot.get(key));
		if (flag === undefined) {
			return undefined;
		}

		const state = authStateFromFlag(flag);
		if (!state) {
			this.log.debug('Shelly: ignoring unusable auth flag in status snapshot: %o', flag);
		}
		return state;
	}

	public async read(device: ShellyDevice, feed?: AuthSnapshotSource): Promise<AuthState> {
		const fromFeed = this.fromSnapshot(feed?.snapshot());
		if (fromFeed) {
			this.log.debug('Shelly: auth state for %s from status feed: %s', device.name, fromFeed);
			return fromFeed;
		}

		return this.poll(device);
	}

	public async poll(device: ShellyDevice): Promise<AuthState> {
		const auth = basicAuthFor(device.credentials);
		const probe = await this.detector.probe(device.host, auth);

		if (probe.status === 401) {
			this.log.debug('Shelly: auth state for %s: enabled (HTTP 401 on /shelly)', device.name);
			return 'enabled';
		}

		if (probe.generation === 'gen2' && probe.info) {
			const info = probe.info;
			const state = authStateFromFlag(firstPresent((key) => info[key]));

			this.log.debug(
				'Shelly: auth state for Gen%d device %s: %s',
				probe.gen,
				device.name,
				state ?? 'unknown',
			);
			return state ?? 'unknown';
		}

		const res = await this.transport.get(device.host, '/settings', READ_TIMEOUT_MS, { auth });

		if (!res.ok) {
			this.log.debug(
				'Shelly: could not check auth status for %s at %s (%s): %s',
				device.name,
				device.host,
				res.kind,
				res.message,
			);
			return 'unknown';
		}

		if (res.status === 401) {
			this.log.debug('Shelly: auth state for %s: enabled (HTTP 401 on /settings)', device.name);
			return 'enabled';
		}

		if (res.status !== 200) {
			this.log.debug('Shelly: /settings on %s returned HTTP %d', device.host, res.status);
			return 'unknown';
		}

		const state = isRecord(res.body) ? authStateFromFlag(res.body.auth) : undefined;

		this.log.debug('Shelly: auth state for Gen1 device %s: %s', device.name, state ?? 'unknown');
		return state ?? 'unknown';
	}
}
