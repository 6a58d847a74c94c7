export { ImouEntity, ImouSwitch, ImouSensor, ImouBinarySensor } from './ImouEntity.js';
export { ImouDevice } from './ImouDevice.js';
export type { DeviceDiagnostics, EntityDiagnostics } from './ImouDevice.js';
export { ImouDiscoverService } from './ImouDiscoverService.js';
