/**
 * Cylinder → plane unwrap.
 *
 * The single source of placement truth for every rendered artifact. Output is
 * always millimetres in template space: x runs around the circumference from
 * the 12 o'clock seam, y runs from the proximal end toward the distal end.
 * Renderers may scale and offset the result for their target, but never
 * recompute it.
 */

import type { Fenestration } from '../fenestration/types';
import type { GraftSpecification } from '../graft';
import { clockToDegrees, normalizeDegrees } from './clock';

export interface PlanarPoint {
    x: number;
    y: number;
}

export function unwrap(
    circumferenceMm: number,
    lengthMm: number,
    clockAngleDeg: number,
    distanceFromProximalMm: number,
): PlanarPoint {
    if (!(distanceFromProximalMm >= 0 && distanceFromProximalMm <= lengthMm)) {
        throw new RangeError(`Distance ${distanceFromProximalMm} mm is outside the graft (0–${lengthMm} mm)`);
    }
    return {
        x: (normalizeDegrees(clockAngleDeg) / 360) * circumferenceMm,
        y: distanceFromProximalMm,
    };
}

export function mapFenestration(graft: GraftSpecification, fenestration: Fenestration): PlanarPoint {
    return unwrap(
        graft.circumferenceMm,
        graft.lengthMm,
        clockToDegrees(fenestration.clockHour),
        fenestration.distanceFromProximalMm,
    );
}

/**
 * Render-target placement: `target = model × scale + offset`.
 * Applied after `unwrap`, never folded into it.
 */
export interface PlacementTransform {
    scale: number;
    offsetX: number;
    offsetY: number;
}

export function applyPlacement(point: PlanarPoint, transform: PlacementTransform): PlanarPoint {
    return {
        x: point.x * transform.scale + transform.offsetX,
        y: point.y * transform.scale + transform.offsetY,
    };
}
