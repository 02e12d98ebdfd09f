import { DEFAULT_TEMPLATE_CONFIG, type TemplateConfig } from '../config';
import { InvalidParameterError, fail, ok, type Result } from '../errors';
import type { GraftSpecification } from '../graft';
import { parseClockHour } from '../unwrap/clock';
import { parseVesselId } from '../vessels';
import type { Fenestration, FenestrationRequest } from './types';

type Bounds = Pick<TemplateConfig, 'minFenestrationDiameterMm' | 'maxFenestrationDiameterMm'>;

/**
 * Check a raw request against the graft and the diameter bounds.
 * Bounds are inclusive on both ends.
 */
export function validateFenestration(
    request: FenestrationRequest,
    graft: GraftSpecification,
    bounds: Bounds = DEFAULT_TEMPLATE_CONFIG,
): Result<Fenestration, InvalidParameterError> {
    const vessel = parseVesselId(request.vessel);
    if (!vessel.ok) return vessel;

    const distance = request.distanceFromProximalMm;
    if (!Number.isFinite(distance) || distance < 0 || distance > graft.lengthMm) {
        return fail(new InvalidParameterError(
            'distanceFromProximalMm',
            `Distance must be within 0–${graft.lengthMm} mm, got ${distance}`,
        ));
    }

    const hour = parseClockHour(request.clockHour);
    if (!hour.ok) return hour;

    const size = request.diameterMm;
    const { minFenestrationDiameterMm: min, maxFenestrationDiameterMm: max } = bounds;
    if (!Number.isFinite(size) || size < min || size > max) {
        return fail(new InvalidParameterError(
            'diameterMm',
            `Fenestration diameter must be within ${min}–${max} mm, got ${size}`,
        ));
    }

    return ok({
        vessel: vessel.value,
        distanceFromProximalMm: distance,
        clockHour: hour.value,
        diameterMm: size,
    });
}

export interface SpacingConflict {
    index: number;
    fenestration: Fenestration;
}

// Distances arrive as decimals; 4.1 - 0.1 is 3.9999999999999996
const SPACING_TOLERANCE_MM = 1e-9;

/**
 * First existing entry closer than `minSpacingMm` along the graft axis, or
 * null. Clock position is not considered.
 */
export function findSpacingConflict(
    existing: readonly Fenestration[],
    candidate: Fenestration,
    minSpacingMm: number,
): SpacingConflict | null {
    for (let index = 0; index < existing.length; index++) {
        const fenestration = existing[index];
        const gap = Math.abs(candidate.distanceFromProximalMm - fenestration.distanceFromProximalMm);
        if (gap < minSpacingMm - SPACING_TOLERANCE_MM) {
            return { index, fenestration };
        }
    }
    return null;
}
