// src/shelly/shelly-accessory-helpers.ts
import type {
	API,
	Logger,
	PlatformAccessory,
} from 'homebridge';

import type { GenerationClass, ShellyDevice } from './types.js';

// Context stored on the accessory
export interface ShellyAccessoryContext {
  shelly?: {
    deviceId: string;
    host: string;

    generation?: GenerationClass;

    // Display-only; refreshed once per launch
    connectivity?: string;
  };
  [key: string]: unknown;
}

// Platform services the accessory setup functions use
export interface ShellyAccessoryEnv {
  log: Logger;
  api: API;
}

export function generationLabel(generation: GenerationClass): string {
	return generation === 'gen2' ? 'Gen2/3' : 'Gen1';
}

/**
 * Populate the standard Accessory Information service from the device record.
 */
export function applyAccessoryInformation(
	api: API,
	accessory: PlatformAccessory,
	device: ShellyDevice,
	generation?: GenerationClass,
): void {
	const infoService = accessory.getService(api.hap.Service.AccessoryInformation);
	if (!infoService) {
		return;
	}

	const Characteristic = api.hap.Characteristic;

	infoService.updateCharacteristic(Characteristic.Name, device.name || accessory.displayName);
	infoService.updateCharacteristic(Characteristic.Manufacturer, 'Shelly');
	infoService.updateCharacteristic(Characteristic.SerialNumber, device.id);

	if (generation) {
		infoService.updateCharacteristic(Characteristic.Model, `Shelly ${generationLabel(generation)}`);
	}
}
