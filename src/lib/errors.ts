/**
 * Planner error taxonomy and result values.
 *
 * User-facing commands never throw for bad input; they return a `Result` whose
 * error side is one of the `PlannerError` subclasses below. Only broken
 * configuration (catalog files, config overrides) throws, at load time.
 */

import type { Fenestration } from './fenestration/types';

export type PlannerErrorKind = 'invalidParameter' | 'spacingConflict';

export abstract class PlannerError extends Error {
    abstract readonly kind: PlannerErrorKind;
}

/**
 * A value outside its allowed range, or an unknown vessel/device key.
 */
export class InvalidParameterError extends PlannerError {
    readonly kind = 'invalidParameter' as const;

    constructor(
        /** Name of the offending input field */
        readonly field: string,
        message: string,
    ) {
        super(message);
        this.name = 'InvalidParameterError';
    }
}

/**
 * The requested fenestration is closer than the minimum longitudinal spacing
 * to an existing one.
 */
export class SpacingConflictError extends PlannerError {
    readonly kind = 'spacingConflict' as const;

    constructor(
        readonly requested: Fenestration,
        readonly conflictIndex: number,
        readonly conflicting: Fenestration,
        readonly minimumSpacingMm: number,
    ) {
        const gap = Math.abs(requested.distanceFromProximalMm - conflicting.distanceFromProximalMm);
        super(
            `Fenestration at ${requested.distanceFromProximalMm} mm is ${formatGap(gap)} mm from ` +
            `F${conflictIndex + 1} at ${conflicting.distanceFromProximalMm} mm ` +
            `(minimum spacing ${minimumSpacingMm} mm)`,
        );
        this.name = 'SpacingConflictError';
    }
}

/**
 * Thrown when a catalog file or config override is malformed.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

export type Result<T, E extends PlannerError = PlannerError> =
    | { ok: true; value: T }
    | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function fail<E extends PlannerError>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

function formatGap(gap: number): string {
    return String(Math.round(gap * 100) / 100);
}
