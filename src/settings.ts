/**
 * Name used in config.json to select this platform.
 */
export const PLATFORM_NAME = 'ShellyAuth';

/**
 * Must match the "name" in package.json.
 */
export const PLUGIN_NAME = 'homebridge-shelly-auth';
