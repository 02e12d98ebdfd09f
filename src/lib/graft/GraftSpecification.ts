import { InvalidParameterError, fail, ok, type Result } from '../errors';

/**
 * Immutable device geometry. The circumference is derived from the diameter
 * on every read so the two can never drift apart.
 */
export class GraftSpecification {
    private constructor(
        readonly diameterMm: number,
        readonly lengthMm: number,
        readonly name: string,
    ) {
        Object.freeze(this);
    }

    static create(diameterMm: number, lengthMm: number, name: string): Result<GraftSpecification, InvalidParameterError> {
        if (!Number.isFinite(diameterMm) || diameterMm <= 0) {
            return fail(new InvalidParameterError('diameterMm', `Graft diameter must be > 0 mm, got ${diameterMm}`));
        }
        if (!Number.isFinite(lengthMm) || lengthMm <= 0) {
            return fail(new InvalidParameterError('lengthMm', `Graft length must be > 0 mm, got ${lengthMm}`));
        }
        if (name.trim() === '') {
            return fail(new InvalidParameterError('name', 'Graft name must not be empty'));
        }
        return ok(new GraftSpecification(diameterMm, lengthMm, name.trim()));
    }

    get circumferenceMm(): number {
        return Math.PI * this.diameterMm;
    }

    /** e.g. "TG-24-145 (24 × 145 mm)" */
    describe(): string {
        return `${this.name} (${this.diameterMm} × ${this.lengthMm} mm)`;
    }
}
