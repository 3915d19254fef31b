// src/shelly/status-feed.ts
// Push-style status snapshots per device.
//
// Readers only ever see the AuthSnapshotSource side: "is there a snapshot, and
// tell me when it changes". ShellyStatusPoller is the producer that keeps a
// feed current by periodically fetching /shelly.

import type { ShellyDevice, ShellyLogger } from './types.js';
import { basicAuthFor, consoleLogger, isRecord } from './types.js';
import type { ShellyTransport } from './transport.js';
import { PROBE_TIMEOUT_MS } from './transport.js';

export interface StatusSnapshot {
	get(key: string): unknown;
}

export type SnapshotListener = () => void;

export interface AuthSnapshotSource {
	snapshot(): StatusSnapshot | undefined;
	subscribe(listener: SnapshotListener): () => void;
}

export class ShellyStatusFeed implements AuthSnapshotSource {
	private current: ReadonlyMap<string, unknown> | undefined;
	private readonly listeners = new Set<SnapshotListener>();

	public snapshot(): StatusSnapshot | undefined {
		return this.current;
	}

	public publish(data: Record<string, unknown>): void {
		this.current = new Map(Object.entries(data));

		for (const listener of this.listeners) {
			listener();
		}
	}

	public subscribe(listener: SnapshotListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}
}

export class ShellyStatusPoller {
	private readonly log: ShellyLogger;
	private timer: NodeJS.Timeout | null = null;

	constructor(
		private readonly device: ShellyDevice,
		private readonly feed: ShellyStatusFeed,
		private readonly transport: ShellyTransport,
		private readonly intervalMs: number,
		logger?: ShellyLogger,
	) {
		this.log = logger ?? consoleLogger('shelly-feed');
	}

	public start(): void {
		this.stop();

		this.timer = setInterval(() => {
			void this.refresh();
		}, this.intervalMs);
	}

	public stop(): void {
		if (this.timer) {
			clearInterval(this.timer);
			this.timer = null;
		}
	}

	/**
	 * Fetch /shelly once and publish it. A failed fetch keeps the last snapshot.
	 */
	public async refresh(): Promise<boolean> {
		const res = await this.transport.get(this.device.host, '/shelly', PROBE_TIMEOUT_MS, {
			auth: basicAuthFor(this.device.credentials),
		});

		if (!res.ok) {
			this.log.debug(
				'Shelly: status refresh for %s (%s) failed (%s): %s',
				this.device.name,
				this.device.host,
				res.kind,
				res.message,
			);
			return false;
		}

		if (res.status !== 200 || !isRecord(res.body)) {
			this.log.debug(
				'Shelly: status refresh for %s (%s) returned HTTP %d without usable data',
				this.device.name,
				this.device.host,
				res.status,
			);
			return false;
		}

		this.feed.publish(res.body);
		return true;
	}
}
