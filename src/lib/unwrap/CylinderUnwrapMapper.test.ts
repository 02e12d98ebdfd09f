import { describe, expect, it } from 'vitest';
import { GraftSpecification } from '../graft';
import { applyPlacement, mapFenestration, unwrap } from './CylinderUnwrapMapper';

const CIRCUMFERENCE = Math.PI * 24;
const LENGTH = 145;

describe('unwrap', () => {
    it('places 12 o\'clock on the seam and y at the distance', () => {
        expect(unwrap(CIRCUMFERENCE, LENGTH, 0, 50)).toEqual({ x: 0, y: 50 });
    });

    it('maps 90° to a quarter of the circumference', () => {
        const point = unwrap(CIRCUMFERENCE, LENGTH, 90, 54);
        expect(point.x).toBeCloseTo(18.85, 2);
        expect(point.y).toBe(54);
    });

    it('is periodic in the angle', () => {
        expect(unwrap(CIRCUMFERENCE, LENGTH, 360, 10).x).toBe(unwrap(CIRCUMFERENCE, LENGTH, 0, 10).x);
        expect(unwrap(CIRCUMFERENCE, LENGTH, 390, 10).x).toBeCloseTo(unwrap(CIRCUMFERENCE, LENGTH, 30, 10).x, 9);
    });

    it('keeps x inside [0, circumference)', () => {
        for (let angle = 0; angle < 720; angle += 15) {
            const { x } = unwrap(CIRCUMFERENCE, LENGTH, angle, 0);
            expect(x).toBeGreaterThanOrEqual(0);
            expect(x).toBeLessThan(CIRCUMFERENCE);
        }
    });

    it('is deterministic', () => {
        const first = unwrap(CIRCUMFERENCE, LENGTH, 150, 72.5);
        const second = unwrap(CIRCUMFERENCE, LENGTH, 150, 72.5);
        expect(second).toEqual(first);
    });

    it('accepts both graft ends', () => {
        expect(unwrap(CIRCUMFERENCE, LENGTH, 0, 0).y).toBe(0);
        expect(unwrap(CIRCUMFERENCE, LENGTH, 0, LENGTH).y).toBe(LENGTH);
    });

    it('refuses distances outside the graft', () => {
        expect(() => unwrap(CIRCUMFERENCE, LENGTH, 0, -0.1)).toThrow(RangeError);
        expect(() => unwrap(CIRCUMFERENCE, LENGTH, 0, LENGTH + 0.1)).toThrow(RangeError);
        expect(() => unwrap(CIRCUMFERENCE, LENGTH, 0, Number.NaN)).toThrow(RangeError);
    });
});

describe('mapFenestration', () => {
    it('uses the graft circumference and the clock angle', () => {
        const graft = GraftSpecification.create(24, 145, 'TG-24-145');
        if (!graft.ok) throw graft.error;

        const point = mapFenestration(graft.value, {
            vessel: 'rightRenal',
            distanceFromProximalMm: 54,
            clockHour: 3,
            diameterMm: 5,
        });
        expect(point.x).toBeCloseTo(CIRCUMFERENCE / 4, 9);
        expect(point.y).toBe(54);
    });
});

describe('applyPlacement', () => {
    it('scales then offsets without touching the input', () => {
        const model = { x: 10, y: 20 };
        expect(applyPlacement(model, { scale: 4, offsetX: 56, offsetY: 40 })).toEqual({ x: 96, y: 120 });
        expect(model).toEqual({ x: 10, y: 20 });
    });
});
