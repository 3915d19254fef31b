// src/shelly/auth-controller.ts

import type { ShellyCredentials, ShellyDevice, ShellyLogger } from './types.js';
import { consoleLogger } from './types.js';
import type { AuthState, AuthStateListener } from './auth-state.js';
import { DeviceAuthState } from './auth-state.js';
import type { AuthStateReader } from './auth-reader.js';
import type { AuthStateWriter } from './auth-writer.js';
import type { ConnectivityReport, ConnectivityReporter } from './connectivity.js';
import type { AuthSnapshotSource } from './status-feed.js';

export interface ShellyAuthControllerDeps {
	reader: AuthStateReader;
	writer: AuthStateWriter;
	reporter: ConnectivityReporter;

	// Absent when the device has no status feed; reads then always poll
	feed?: AuthSnapshotSource;
	logger?: ShellyLogger;
}

/**
 * Everything one device needs: its auth state, how to refresh it, and how to
 * change it. Writer credentials are handed in here rather than looked up.
 */
export class ShellyAuthController {
	public readonly state = new DeviceAuthState();

	private readonly log: ShellyLogger;
	private unsubscribeFeed: (() => void) | null = null;

	constructor(
		public readonly device: ShellyDevice,
		private readonly writerCredentials: ShellyCredentials,
		private readonly deps: ShellyAuthControllerDeps,
	) {
		this.log = deps.logger ?? consoleLogger('shelly');
	}

	public get authState(): AuthState {
		return this.state.value;
	}

	public onStateChange(listener: AuthStateListener): () => void {
		return this.state.onChange(listener);
	}

	/**
	 * Initial read, then follow the feed (if any) for the rest of the session.
	 */
	public async attach(): Promise<AuthState> {
		const feed = this.deps.feed;

		if (feed && !this.unsubscribeFeed) {
			this.unsubscribeFeed = feed.subscribe(() => {
				void this.refresh();
			});
			this.log.debug('Shelly: subscribed to status feed for %s', this.device.name);
		}

		return this.refresh();
	}

	public detach(): void {
		if (this.unsubscribeFeed) {
			this.unsubscribeFeed();
			this.unsubscribeFeed = null;
		}
	}

	public async refresh(): Promise<AuthState> {
		const next = await this.deps.reader.read(this.device, this.deps.feed);
		this.state.set(next);
		return next;
	}

	public setAuth(enable: boolean): Promise<boolean> {
		return this.deps.writer.setAuth(this.device, this.writerCredentials, enable, this.state);
	}

	public describeConnectivity(): Promise<ConnectivityReport> {
		return this.deps.reporter.report(this.device, this.device.credentials);
	}
}
