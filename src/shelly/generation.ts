// src/shelly/generation.ts

import type { GenerationClass, ShellyCredentials, ShellyLogger } from './types.js';
import { consoleLogger, isRecord } from './types.js';
import type { HttpFailureKind, ShellyTransport } from './transport.js';
import { PROBE_TIMEOUT_MS } from './transport.js';

export interface ShellyProbe {
	generation: GenerationClass;

	// Raw `gen` field as reported (1 when absent or unreadable)
	gen: number;

	// HTTP status, when the device answered at all
	status?: number;

	// Parsed /shelly body, only for HTTP 200
	info?: Record<string, unknown>;

	// Why the probe produced no answer
	failure?: HttpFailureKind;
}

export function classifyGeneration(gen: number): GenerationClass {
	return gen >= 2 ? 'gen2' : 'gen1';
}

/**
 * Classifies a device by its `/shelly` self-description.
 * Anything short of a well-formed HTTP 200 answer is reported as Gen1.
 */
export class GenerationDetector {
	private readonly log: ShellyLogger;

	constructor(
		private readonly transport: ShellyTransport,
		logger?: ShellyLogger,
	) {
		this.log = logger ?? consoleLogger('shelly-gen');
	}

	public async probe(host: string, auth?: ShellyCredentials): Promise<ShellyProbe> {
		const res = await this.transport.get(host, '/shelly', PROBE_TIMEOUT_MS, { auth });

		if (!res.ok) {
			this.log.debug('Shelly: /shelly probe on %s failed (%s): %s', host, res.kind, res.message);
			return { generation: 'gen1', gen: 1, failure: res.kind };
		}

		if (res.status !== 200) {
			this.log.debug('Shelly: /shelly probe on %s returned HTTP %d', host, res.status);
			return { generation: 'gen1', gen: 1, status: res.status };
		}

		if (!isRecord(res.body)) {
			this.log.debug('Shelly: /shelly probe on %s returned a non-object body', host);
			return { generation: 'gen1', gen: 1, status: res.status, failure: 'decode' };
		}

		const gen = typeof res.body.gen === 'number' ? res.body.gen : 1;

		return {
			generation: classifyGeneration(gen),
			gen,
			status: res.status,
			info: res.body,
		};
	}

	public async detect(host: string): Promise<GenerationClass> {
		const probe = await this.probe(host);
		return probe.generation;
	}
}
