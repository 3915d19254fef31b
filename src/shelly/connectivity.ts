// src/shelly/connectivity.ts

import type { GenerationClass, ShellyCredentials, ShellyDevice, ShellyLogger } from './types.js';
import { basicAuthFor, consoleLogger, isRecord } from './types.js';
import type { GenerationDetector } from './generation.js';
import type { ShellyTransport } from './transport.js';
import { READ_TIMEOUT_MS } from './transport.js';

export const CONNECTIVITY_MULTICAST = 'multicast';
export const CONNECTIVITY_AUTH_REQUIRED = 'unknown (auth required)';
export const CONNECTIVITY_WS_NOT_CONFIGURED = 'not configured (discovery-based)';
export const CONNECTIVITY_WS_FALLBACK = 'auto-discovery (fallback)';
export const CONNECTIVITY_UNKNOWN = 'unknown';

function nestedString(body: unknown, section: string, key: string): string {
	if (!isRecord(body)) {
		return '';
	}
	const inner = body[section];
	if (!isRecord(inner)) {
		return '';
	}
	const value = inner[key];
	return typeof value === 'string' ? value : '';
}

export interface ConnectivityReport {
	generation: GenerationClass;
	descriptor: string;
}

/**
 * Display-only: how a device reaches its controller. CoIoT peer on Gen1,
 * outbound WebSocket server on Gen2/3.
 */
export class ConnectivityReporter {
	private readonly log: ShellyLogger;

	constructor(
		private readonly transport: ShellyTransport,
		private readonly detector: GenerationDetector,
		logger?: ShellyLogger,
	) {
		this.log = logger ?? consoleLogger('shelly-connectivity');
	}

	public async describe(device: ShellyDevice, credentials?: ShellyCredentials): Promise<string> {
		const report = await this.report(device, credentials);
		return report.descriptor;
	}

	/**
	 * Same as describe(), plus the generation detected on the way.
	 */
	public async report(device: ShellyDevice, credentials?: ShellyCredentials): Promise<ConnectivityReport> {
		const generation = await this.detector.detect(device.host);
		const auth = basicAuthFor(credentials);

		const descriptor = generation === 'gen2'
			? await this.describeWebSocket(device, auth)
			: await this.describeCoiot(device, auth);

		this.log.debug('Shelly: connectivity for %s: %s', device.name, descriptor);
		return { generation, descriptor };
	}

	private async describeCoiot(device: ShellyDevice, auth?: ShellyCredentials): Promise<string> {
		const res = await this.transport.get(device.host, '/settings', READ_TIMEOUT_MS, { auth });

		if (!res.ok) {
			this.log.debug(
				'Shelly: could not load CoIoT settings for %s (%s): %s',
				device.name,
				res.kind,
				res.message,
			);
			return CONNECTIVITY_UNKNOWN;
		}

		if (res.status === 401) {
			return CONNECTIVITY_AUTH_REQUIRED;
		}
		if (res.status !== 200) {
			return CONNECTIVITY_UNKNOWN;
		}

		const peer = nestedString(res.body, 'coiot', 'peer');
		return peer ? `unicast ${peer}` : CONNECTIVITY_MULTICAST;
	}

	private async describeWebSocket(device: ShellyDevice, auth?: ShellyCredentials): Promise<string> {
		const res = await this.transport.post(device.host, '/rpc/Sys.GetConfig', {}, READ_TIMEOUT_MS, { auth });

		if (!res.ok) {
			this.log.debug(
				'Shelly: could not load WebSocket config for %s (%s): %s',
				device.name,
				res.kind,
				res.message,
			);
			return CONNECTIVITY_WS_FALLBACK;
		}

		if (res.status === 401) {
			return CONNECTIVITY_AUTH_REQUIRED;
		}
		if (res.status !== 200) {
			return CONNECTIVITY_UNKNOWN;
		}

		const server = nestedString(res.body, 'ws', 'server');
		return server || CONNECTIVITY_WS_NOT_CONFIGURED;
	}
}
