import type { VesselId } from '../vessels';
import { clockToDegrees, type ClockHour } from '../unwrap/clock';

/**
 * A validated, planned opening in the graft wall.
 * Identity is the position in the registry.
 */
export interface Fenestration {
    readonly vessel: VesselId;
    readonly distanceFromProximalMm: number;
    readonly clockHour: ClockHour;
    readonly diameterMm: number;
}

/**
 * Raw selection coming from the form layer, before validation.
 */
export interface FenestrationRequest {
    vessel: string;
    distanceFromProximalMm: number;
    clockHour: number;
    diameterMm: number;
}

export function clockAngleDeg(fenestration: Pick<Fenestration, 'clockHour'>): number {
    return clockToDegrees(fenestration.clockHour);
}
