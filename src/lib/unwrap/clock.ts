/**
 * Clock-face positions around the graft. 12 o'clock is anterior (0°) and the
 * angle grows clockwise by 30° per hour, as seen looking down the graft from
 * the proximal end.
 */

import { InvalidParameterError, fail, ok, type Result } from '../errors';

export type ClockHour = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;

export const CLOCK_HOURS: readonly ClockHour[] = [12, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11];

export const DEGREES_PER_HOUR = 30;

export type ClockRegion =
    | 'Anterior'
    | 'Anterior-Left'
    | 'Left'
    | 'Posterior-Left'
    | 'Posterior'
    | 'Posterior-Right'
    | 'Right'
    | 'Anterior-Right';

export function isClockHour(value: number): value is ClockHour {
    return Number.isInteger(value) && value >= 1 && value <= 12;
}

export function parseClockHour(value: number): Result<ClockHour, InvalidParameterError> {
    return isClockHour(value)
        ? ok(value)
        : fail(new InvalidParameterError('clockHour', `Clock hour must be an integer from 1 to 12, got ${value}`));
}

export function clockToDegrees(hour: ClockHour): number {
    return hour === 12 ? 0 : hour * DEGREES_PER_HOUR;
}

/**
 * Normalise any angle into [0, 360).
 */
export function normalizeDegrees(degrees: number): number {
    const wrapped = degrees % 360;
    if (wrapped === 0) return 0; // also folds -0
    if (wrapped > 0) return wrapped;
    const shifted = wrapped + 360;
    return shifted >= 360 ? 0 : shifted;
}

/**
 * Nearest clock hour for an arbitrary angle.
 */
export function degreesToClock(degrees: number): ClockHour {
    const steps = Math.round(normalizeDegrees(degrees) / DEGREES_PER_HOUR) % 12;
    const hour = steps === 0 ? 12 : steps;
    return isClockHour(hour) ? hour : 12;
}

const REGIONS: Record<ClockHour, ClockRegion> = {
    12: 'Anterior',
    1: 'Anterior-Left',
    2: 'Anterior-Left',
    3: 'Left',
    4: 'Posterior-Left',
    5: 'Posterior-Left',
    6: 'Posterior',
    7: 'Posterior-Right',
    8: 'Posterior-Right',
    9: 'Right',
    10: 'Anterior-Right',
    11: 'Anterior-Right',
};

export function clockRegion(hour: ClockHour): ClockRegion {
    return REGIONS[hour];
}
