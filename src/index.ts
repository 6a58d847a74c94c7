import type { API } from 'homebridge';

import { ImouLifePlatform } from './platform.js';
import { PLATFORM_NAME } from './settings.js';

export * from './api/index.js';
export * from './devices/index.js';

/**
 * This method registers the platform with Homebridge
 */
export default (api: API) => {
  api.registerPlatform(PLATFORM_NAME, ImouLifePlatform);
};
