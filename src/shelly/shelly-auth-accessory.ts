// src/shelly/shelly-auth-accessory.ts
import type { CharacteristicValue, PlatformAccessory } from 'homebridge';

import type { ShellyAuthController } from './auth-controller.js';
import type { GenerationClass } from './types.js';
import type { ShellyAccessoryContext, ShellyAccessoryEnv } from './shelly-accessory-helpers.js';
import { applyAccessoryInformation } from './shelly-accessory-helpers.js';

/**
 * Expose the auth toggle of one device as a HomeKit Switch.
 *
 * `unknown` is never reported as on or off: reads fail with "No Response"
 * until a real state is known.
 */
export function configureShellyAuthAccessory(
	env: ShellyAccessoryEnv,
	accessory: PlatformAccessory,
	controller: ShellyAuthController,
): void {
	const device = controller.device;
	const Characteristic = env.api.hap.Characteristic;

	const service =
    accessory.getService(env.api.hap.Service.Switch) ||
    accessory.addService(env.api.hap.Service.Switch, 'Authentication');

	applyAccessoryInformation(env.api, accessory, device);

	const ctx = accessory.context as ShellyAccessoryContext;
	ctx.shelly = {
		...ctx.shelly,
		deviceId: device.id,
		host: device.host,
	};

	service
		.getCharacteristic(Characteristic.On)
		.onGet(() => {
			const state = controller.authState;

			if (state === 'unknown') {
				env.log.debug('Shelly: Auth On.get -> unknown for %s', device.name);
				throw new env.api.hap.HapStatusError(
					env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE,
				);
			}

			return state === 'enabled';
		})
		.onSet(async (value: CharacteristicValue) => {
			const enable = value === true || value === 1;

			env.log.info(
				'Shelly: Auth On.set -> %s for %s (%s)',
				String(enable),
				device.name,
				device.host,
			);

			const ok = await controller.setAuth(enable);
			if (!ok) {
				throw new env.api.hap.HapStatusError(
					env.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE,
				);
			}
		});

	controller.onStateChange((state) => {
		if (state === 'unknown') {
			return;
		}
		service.updateCharacteristic(Characteristic.On, state === 'enabled');
	});
}

/**
 * Record what we learned about the device: generation on the info service,
 * host and connectivity in the context and the log.
 */
export function recordShellyDetails(
	env: ShellyAccessoryEnv,
	accessory: PlatformAccessory,
	controller: ShellyAuthController,
	generation: GenerationClass,
	connectivity: string,
): void {
	const device = controller.device;

	applyAccessoryInformation(env.api, accessory, device, generation);

	const ctx = accessory.context as ShellyAccessoryContext;
	ctx.shelly = {
		deviceId: device.id,
		host: device.host,
		generation,
		connectivity,
	};

	env.log.info(
		'Shelly: %s at %s connectivity=%s',
		device.name,
		device.host,
		connectivity,
	);
}
