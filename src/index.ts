import type { API } from 'homebridge';

import { ShellyAuthPlatform } from './platform.js';
import { PLATFORM_NAME } from './settings.js';

/**
 * Homebridge entry point.
 * Registers the ShellyAuthPlatform with Homebridge under PLATFORM_NAME.
 */
export default (api: API) => {
	api.registerPlatform(PLATFORM_NAME, ShellyAuthPlatform);
};
