export { GraftSpecification } from './GraftSpecification';
export { DEVICE_CATALOG, findDevice, graftFromDevice, parseDeviceCatalog } from './devices';
export type { DeviceEntry } from './devices';
