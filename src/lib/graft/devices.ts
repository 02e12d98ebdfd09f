/**
 * Device catalog loaded from `data/devices.json`.
 *
 * Adding a device is a data change: append an entry to the JSON file. The file
 * is validated once at import; a malformed entry fails loudly instead of
 * producing a template with wrong dimensions.
 */

import rawDevices from '../data/devices.json';
import { ConfigurationError, InvalidParameterError, fail, type Result } from '../errors';
import { GraftSpecification } from './GraftSpecification';

export interface DeviceEntry {
    key: string;
    label: string;
    name: string;
    diameterMm: number;
    lengthMm: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(entry: Record<string, unknown>, field: string, index: number): string {
    const value = entry[field];
    if (typeof value !== 'string' || value.trim() === '') {
        throw new ConfigurationError(`Device #${index}: "${field}" must be a non-empty string`);
    }
    return value;
}

function readDimension(entry: Record<string, unknown>, field: string, index: number): number {
    const value = entry[field];
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
        throw new ConfigurationError(`Device #${index}: "${field}" must be a positive number`);
    }
    return value;
}

export function parseDeviceCatalog(raw: unknown): readonly DeviceEntry[] {
    if (!Array.isArray(raw)) {
        throw new ConfigurationError('Device catalog must be a JSON array');
    }

    const seen = new Set<string>();
    return raw.map((entry: unknown, index) => {
        if (!isRecord(entry)) {
            throw new ConfigurationError(`Device #${index} must be an object`);
        }
        const device: DeviceEntry = {
            key: readString(entry, 'key', index),
            label: readString(entry, 'label', index),
            name: readString(entry, 'name', index),
            diameterMm: readDimension(entry, 'diameterMm', index),
            lengthMm: readDimension(entry, 'lengthMm', index),
        };
        if (seen.has(device.key)) {
            throw new ConfigurationError(`Duplicate device key "${device.key}"`);
        }
        seen.add(device.key);
        return device;
    });
}

export const DEVICE_CATALOG = parseDeviceCatalog(rawDevices);

export function findDevice(key: string, catalog: readonly DeviceEntry[] = DEVICE_CATALOG): DeviceEntry | undefined {
    return catalog.find(device => device.key === key);
}

/**
 * Build the graft specification for a catalog device.
 */
export function graftFromDevice(
    key: string,
    catalog: readonly DeviceEntry[] = DEVICE_CATALOG,
): Result<GraftSpecification, InvalidParameterError> {
    const device = findDevice(key, catalog);
    if (!device) {
        return fail(new InvalidParameterError('device', `Unknown device "${key}"`));
    }
    return GraftSpecification.create(device.diameterMm, device.lengthMm, device.name);
}
