// src/shelly/auth-writer.ts

import type { ShellyCredentials, ShellyDevice, ShellyLogger } from './types.js';
import { DEFAULT_USERNAME, consoleLogger } from './types.js';
import type { DeviceAuthState } from './auth-state.js';
import type { GenerationDetector, ShellyProbe } from './generation.js';
import type { HttpResult, ShellyTransport } from './transport.js';
import { MUTATION_TIMEOUT_MS } from './transport.js';

export class AuthStateWriter {
	private readonly log: ShellyLogger;

	constructor(
		private readonly transport: ShellyTransport,
		private readonly detector: GenerationDetector,
		logger?: ShellyLogger,
	) {
		this.log = logger ?? consoleLogger('shelly-write');
	}

	/**
	 * Turn authentication on or off with the installation-wide credentials.
	 *
	 * Enabling is sent unauthenticated (the device has no auth yet); disabling
	 * has to authenticate with the credentials being removed. On HTTP 200 the
	 * state is updated optimistically; any other outcome leaves it as it was.
	 */
	public async setAuth(
		device: ShellyDevice,
		credentials: ShellyCredentials,
		enable: boolean,
		state: DeviceAuthState,
	): Promise<boolean> {
		const password = credentials.password;
		if (!password) {
			this.log.error('Shelly: no password configured; cannot change auth on %s', device.name);
			return false;
		}

		const auth: ShellyCredentials = {
			username: credentials.username || DEFAULT_USERNAME,
			password,
		};

		const probe = await this.detector.probe(device.host);
		if (probe.status !== 200) {
			// TODO: report a probe timeout as its own failure instead of guessing Gen1
			this.log.debug(
				'Shelly: generation probe for %s failed (%s); assuming Gen1',
				device.name,
				probe.failure ?? `HTTP ${String(probe.status)}`,
			);
		}

		const res = probe.generation === 'gen2'
			? await this.setAuthRpc(device, auth, enable)
			: await this.setAuthRest(device, auth, enable);

		return this.finish(device, probe, enable, res, state);
	}

	private setAuthRpc(device: ShellyDevice, auth: ShellyCredentials, enable: boolean): Promise<HttpResult> {
		if (enable) {
			return this.transport.post(
				device.host,
				'/rpc/Sys.SetAuth',
				{ user: auth.username, pass: auth.password },
				MUTATION_TIMEOUT_MS,
				{ parse: false },
			);
		}

		return this.transport.post(
			device.host,
			'/rpc/Sys.SetAuth',
			{ user: null },
			MUTATION_TIMEOUT_MS,
			{ auth, parse: false },
		);
	}

	private setAuthRest(device: ShellyDevice, auth: ShellyCredentials, enable: boolean): Promise<HttpResult> {
		if (enable) {
			return this.transport.get(device.host, '/settings/login', MUTATION_TIMEOUT_MS, {
				query: {
					enabled: '1',
					username: auth.username,
					password: auth.password,
				},
				parse: false,
			});
		}

		return this.transport.get(device.host, '/settings/login', MUTATION_TIMEOUT_MS, {
			query: { enabled: '0' },
			auth,
			parse: false,
		});
	}

	private finish(
		device: ShellyDevice,
		probe: ShellyProbe,
		enable: boolean,
		res: HttpResult,
		state: DeviceAuthState,
	): boolean {
		const genLabel = probe.generation === 'gen2' ? `Gen${probe.gen}` : 'Gen1';

		if (!res.ok) {
			this.log.error(
				'Shelly: error setting auth on %s at %s (%s): %s',
				device.name,
				device.host,
				res.kind,
				res.message,
			);
			return false;
		}

		if (res.status !== 200) {
			this.log.error(
				'Shelly: failed to %s auth on %s device %s: HTTP %d',
				enable ? 'enable' : 'disable',
				genLabel,
				device.name,
				res.status,
			);
			return false;
		}

		this.log.info(
			'Shelly: auth %s on %s device %s at %s',
			enable ? 'enabled' : 'disabled',
			genLabel,
			device.name,
			device.host,
		);

		state.set(enable ? 'enabled' : 'disabled');
		return true;
	}
}
