import { describe, expect, it } from 'vitest';
import {
    CLOCK_HOURS,
    clockRegion,
    clockToDegrees,
    degreesToClock,
    normalizeDegrees,
    parseClockHour,
} from './clock';

describe('clock positions', () => {
    it('maps 12 o\'clock to 0° and every other hour to hour × 30°', () => {
        for (const hour of CLOCK_HOURS) {
            expect(clockToDegrees(hour)).toBe(hour === 12 ? 0 : hour * 30);
        }
    });

    it('keeps every angle inside [0, 360)', () => {
        for (const hour of CLOCK_HOURS) {
            const angle = clockToDegrees(hour);
            expect(angle).toBeGreaterThanOrEqual(0);
            expect(angle).toBeLessThan(360);
        }
    });

    it('round-trips hours through degrees', () => {
        for (const hour of CLOCK_HOURS) {
            expect(degreesToClock(clockToDegrees(hour))).toBe(hour);
        }
    });

    it('snaps arbitrary angles to the nearest hour', () => {
        expect(degreesToClock(359)).toBe(12);
        expect(degreesToClock(-30)).toBe(11);
        expect(degreesToClock(100)).toBe(3);
        expect(degreesToClock(720)).toBe(12);
    });

    it('normalises angles', () => {
        expect(normalizeDegrees(360)).toBe(0);
        expect(normalizeDegrees(-0)).toBe(0);
        expect(normalizeDegrees(-90)).toBe(270);
        expect(normalizeDegrees(450)).toBe(90);
    });

    it('names anatomical regions', () => {
        expect(clockRegion(12)).toBe('Anterior');
        expect(clockRegion(3)).toBe('Left');
        expect(clockRegion(6)).toBe('Posterior');
        expect(clockRegion(9)).toBe('Right');
        expect(clockRegion(1)).toBe('Anterior-Left');
        expect(clockRegion(5)).toBe('Posterior-Left');
        expect(clockRegion(8)).toBe('Posterior-Right');
        expect(clockRegion(11)).toBe('Anterior-Right');
    });

    it('accepts only whole hours from 1 to 12', () => {
        expect(parseClockHour(12).ok).toBe(true);
        expect(parseClockHour(1).ok).toBe(true);
        for (const bad of [0, 13, 2.5, -3, Number.NaN]) {
            const result = parseClockHour(bad);
            expect(result.ok).toBe(false);
            if (!result.ok) expect(result.error.field).toBe('clockHour');
        }
    });
});
