import { clockRegion } from '../unwrap/clock';
import { getVessel } from '../vessels';
import type { Fenestration } from './types';

/**
 * Millimetre value with at most one decimal and no trailing zero:
 * 6 → "6", 5.25 → "5.3".
 */
export function formatMm(value: number): string {
    return String(Number(value.toFixed(1)));
}

/** "F1" for index 0 */
export function fenestrationLabel(index: number): string {
    return `F${index + 1}`;
}

/**
 * Annotation printed beside a fenestration: `Ø6 @ 50 / 12 o'clock`.
 */
export function fenestrationAnnotation(fenestration: Fenestration): string {
    return `Ø${formatMm(fenestration.diameterMm)} @ ${formatMm(fenestration.distanceFromProximalMm)} / ${fenestration.clockHour} o'clock`;
}

/**
 * One line of the fenestration list:
 * `F1: SMA, 50 mm from proximal, 12 o'clock (Anterior), Ø6 mm`.
 */
export function describeFenestration(index: number, fenestration: Fenestration): string {
    const vessel = getVessel(fenestration.vessel);
    return `${fenestrationLabel(index)}: ${vessel.shortLabel}, ` +
        `${formatMm(fenestration.distanceFromProximalMm)} mm from proximal, ` +
        `${fenestration.clockHour} o'clock (${clockRegion(fenestration.clockHour)}), ` +
        `Ø${formatMm(fenestration.diameterMm)} mm`;
}
