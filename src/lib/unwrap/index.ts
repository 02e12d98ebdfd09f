export { unwrap, mapFenestration, applyPlacement } from './CylinderUnwrapMapper';
export type { PlanarPoint, PlacementTransform } from './CylinderUnwrapMapper';
export {
    CLOCK_HOURS,
    DEGREES_PER_HOUR,
    clockToDegrees,
    degreesToClock,
    normalizeDegrees,
    clockRegion,
    isClockHour,
    parseClockHour,
} from './clock';
export type { ClockHour, ClockRegion } from './clock';
