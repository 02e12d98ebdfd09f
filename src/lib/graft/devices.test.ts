import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { DEVICE_CATALOG, findDevice, graftFromDevice, parseDeviceCatalog } from './devices';

describe('device catalog', () => {
    it('loads the bundled catalog', () => {
        expect(DEVICE_CATALOG.length).toBeGreaterThan(0);
        expect(findDevice('tube-24x145')).toEqual({
            key: 'tube-24x145',
            label: 'Tube graft 24 × 145 mm',
            name: 'TG-24-145',
            diameterMm: 24,
            lengthMm: 145,
        });
    });

    it('covers every standard diameter', () => {
        const diameters = new Set(DEVICE_CATALOG.map(device => device.diameterMm));
        for (const diameter of [20, 24, 28, 32, 36]) {
            expect(diameters.has(diameter)).toBe(true);
        }
    });

    it('builds a graft specification from a device key', () => {
        const result = graftFromDevice('tube-24x145');
        if (!result.ok) throw result.error;
        expect(result.value.diameterMm).toBe(24);
        expect(result.value.lengthMm).toBe(145);
        expect(result.value.name).toBe('TG-24-145');
    });

    it('reports unknown device keys as invalid parameters', () => {
        const result = graftFromDevice('tube-99x999');
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.field).toBe('device');
        expect(result.error.message).toBe('Unknown device "tube-99x999"');
    });

    it('uses a caller-supplied catalog', () => {
        const catalog = parseDeviceCatalog([
            { key: 'custom', label: 'Custom', name: 'C-1', diameterMm: 30, lengthMm: 90 },
        ]);
        const result = graftFromDevice('custom', catalog);
        if (!result.ok) throw result.error;
        expect(result.value.describe()).toBe('C-1 (30 × 90 mm)');
    });

    describe('parseDeviceCatalog', () => {
        it('rejects a non-array document', () => {
            expect(() => parseDeviceCatalog({ devices: [] })).toThrow(ConfigurationError);
        });

        it('rejects non-positive dimensions', () => {
            expect(() => parseDeviceCatalog([
                { key: 'a', label: 'A', name: 'A', diameterMm: -1, lengthMm: 100 },
            ])).toThrow('Device #0: "diameterMm" must be a positive number');
        });

        it('rejects missing strings', () => {
            expect(() => parseDeviceCatalog([
                { key: 'a', name: 'A', diameterMm: 20, lengthMm: 100 },
            ])).toThrow('Device #0: "label" must be a non-empty string');
        });

        it('rejects duplicate keys', () => {
            const entry = { key: 'a', label: 'A', name: 'A', diameterMm: 20, lengthMm: 100 };
            expect(() => parseDeviceCatalog([entry, entry])).toThrow('Duplicate device key "a"');
        });
    });
});
