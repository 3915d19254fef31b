// src/platform.ts
import type {
	API,
	DynamicPlatformPlugin,
	Logger,
	PlatformAccessory,
	PlatformConfig,
} from 'homebridge';

import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import type { ShellyLogger } from './shelly/types.js';
import { ShellyTransport } from './shelly/transport.js';
import { GenerationDetector } from './shelly/generation.js';
import { AuthStateReader } from './shelly/auth-reader.js';
import { AuthStateWriter } from './shelly/auth-writer.js';
import { ConnectivityReporter } from './shelly/connectivity.js';
import { ShellyStatusFeed, ShellyStatusPoller } from './shelly/status-feed.js';
import { ShellyAuthController } from './shelly/auth-controller.js';
import { resolvePluginConfig } from './shelly/plugin-config.js';
import type { ShellyAccessoryEnv } from './shelly/shelly-accessory-helpers.js';
import {
	configureShellyAuthAccessory,
	recordShellyDetails,
} from './shelly/shelly-auth-accessory.js';

const toShellyLogger = (log: Logger): ShellyLogger => ({
	debug: log.debug.bind(log),
	info: log.info.bind(log),
	warn: log.warn.bind(log),
	error: log.error.bind(log),
});

export class ShellyAuthPlatform implements DynamicPlatformPlugin {
	public readonly accessories: PlatformAccessory[] = [];
	public configureAccessory(accessory: PlatformAccessory): void {
		this.log.info('Restoring cached accessory', accessory.displayName);
		this.accessories.push(accessory);
	}
	private readonly log: Logger;
	private readonly api: API;
	private readonly config: PlatformConfig;
	private readonly shellyLog: ShellyLogger;
	private readonly accessoryEnv: ShellyAccessoryEnv;

	private readonly reader: AuthStateReader;
	private readonly writer: AuthStateWriter;
	private readonly reporter: ConnectivityReporter;
	private readonly transport: ShellyTransport;

	private readonly controllers = new Map<string, ShellyAuthController>();
	private readonly pollers: ShellyStatusPoller[] = [];

	constructor(log: Logger, config: PlatformConfig, api: API) {
		this.log = log;
		this.config = config;
		this.api = api;

		this.shellyLog = toShellyLogger(this.log);
		this.transport = new ShellyTransport(this.shellyLog);
		const detector = new GenerationDetector(this.transport, this.shellyLog);
		this.reader = new AuthStateReader(this.transport, detector, this.shellyLog);
		this.writer = new AuthStateWriter(this.transport, detector, this.shellyLog);
		this.reporter = new ConnectivityReporter(this.transport, detector, this.shellyLog);

		this.accessoryEnv = {
			log: this.log,
			api: this.api,
		};

		this.log.info(this.config.name ?? PLATFORM_NAME, 'initialized');

		this.api.on('didFinishLaunching', () => {
			this.log.info(PLATFORM_NAME, 'didFinishLaunching');
			this.loadDevices().catch((err: unknown) => {
				this.log.error(
					'Shelly: device setup failed: %s',
					err instanceof Error ? err.message : String(err),
				);
			});
		});

		this.api.on('shutdown', () => {
			this.shutdown();
		});
	}

	private async loadDevices(): Promise<void> {
		const resolved = resolvePluginConfig(this.config, this.shellyLog);

		if (!resolved.writer.password) {
			this.log.warn('Shelly: no password in config.json; auth changes will be rejected.');
		}

		this.log.info('Shelly: found %d configured devices', resolved.devices.length);

		const activeUuids = new Set<string>();
		const attached: Array<{ controller: ShellyAuthController; accessory: PlatformAccessory }> = [];

		for (const device of resolved.devices) {
			const uuid = this.api.hap.uuid.generate(`shelly-auth-${device.id}`);
			activeUuids.add(uuid);

			let accessory = this.accessories.find(acc => acc.UUID === uuid);

			if (accessory) {
				this.log.info('Shelly: using cached accessory for %s (%s)', device.name, device.host);
			} else {
				this.log.info('Shelly: registering new accessory for %s (%s)', device.name, device.host);

				accessory = new this.api.platformAccessory(device.name, uuid);
				this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
				this.accessories.push(accessory);
			}

			let feed: ShellyStatusFeed | undefined;
			if (resolved.refreshIntervalMs > 0) {
				feed = new ShellyStatusFeed();
				this.pollers.push(new ShellyStatusPoller(
					device,
					feed,
					this.transport,
					resolved.refreshIntervalMs,
					this.shellyLog,
				));
			}

			const controller = new ShellyAuthController(device, resolved.writer, {
				reader: this.reader,
				writer: this.writer,
				reporter: this.reporter,
				feed,
				logger: this.shellyLog,
			});
			this.controllers.set(device.id, controller);

			configureShellyAuthAccessory(this.accessoryEnv, accessory, controller);
			attached.push({ controller, accessory });
		}

		this.removeStaleAccessories(activeUuids);

		// Each device attaches on its own.
		await Promise.all(
			attached.map(async ({ controller, accessory }) => {
				const device = controller.device;

				const state = await controller.attach();
				this.log.info('Shelly: %s auth state is %s', device.name, state);

				const { generation, descriptor } = await controller.describeConnectivity();
				recordShellyDetails(this.accessoryEnv, accessory, controller, generation, descriptor);
			}),
		);

		for (const poller of this.pollers) {
			poller.start();
		}
	}

	private removeStaleAccessories(activeUuids: Set<string>): void {
		const stale = this.accessories.filter(acc => !activeUuids.has(acc.UUID));
		if (!stale.length) {
			return;
		}

		for (const accessory of stale) {
			this.log.info('Shelly: removing accessory no longer in config: %s', accessory.displayName);
			this.accessories.splice(this.accessories.indexOf(accessory), 1);
		}

		this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, stale);
	}

	private shutdown(): void {
		for (const poller of this.pollers) {
			poller.stop();
		}
		for (const controller of this.controllers.values()) {
			controller.detach();
		}
	}
}
