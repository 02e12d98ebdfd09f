import { DEFAULT_TEMPLATE_CONFIG } from '../config';
import {
    InvalidParameterError,
    SpacingConflictError,
    fail,
    ok,
    type Result,
} from '../errors';
import type { Fenestration } from './types';
import { findSpacingConflict } from './validation';

/**
 * Ordered collection of planned fenestrations.
 *
 * The registry is an immutable value: `add`, `remove` and `clear` return a new
 * registry and leave the receiver untouched. A rejected add therefore cannot
 * leave partial state behind. Entries keep insertion order, which is the
 * display order (F1, F2, …) and has no geometric meaning.
 *
 * Invariant: every pair of entries is at least `minSpacingMm` apart along the
 * graft axis.
 */
export class FenestrationRegistry implements Iterable<Fenestration> {
    private constructor(
        private readonly items: readonly Fenestration[],
        readonly minSpacingMm: number,
    ) {}

    static empty(minSpacingMm: number = DEFAULT_TEMPLATE_CONFIG.minSpacingMm): FenestrationRegistry {
        return new FenestrationRegistry([], minSpacingMm);
    }

    get size(): number {
        return this.items.length;
    }

    get isEmpty(): boolean {
        return this.items.length === 0;
    }

    get(index: number): Fenestration | undefined {
        return this.items[index];
    }

    toArray(): Fenestration[] {
        return [...this.items];
    }

    [Symbol.iterator](): Iterator<Fenestration> {
        return this.items[Symbol.iterator]();
    }

    /**
     * Append a validated fenestration, or report the first entry it would sit
     * too close to.
     */
    add(fenestration: Fenestration): Result<FenestrationRegistry, SpacingConflictError> {
        const conflict = findSpacingConflict(this.items, fenestration, this.minSpacingMm);
        if (conflict) {
            return fail(new SpacingConflictError(
                fenestration,
                conflict.index,
                conflict.fenestration,
                this.minSpacingMm,
            ));
        }
        return ok(new FenestrationRegistry([...this.items, fenestration], this.minSpacingMm));
    }

    /**
     * Removal can only relax the spacing invariant, so nothing is re-checked.
     */
    remove(index: number): Result<FenestrationRegistry, InvalidParameterError> {
        if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
            return fail(new InvalidParameterError(
                'index',
                `No fenestration at index ${index} (registry holds ${this.items.length})`,
            ));
        }
        return ok(new FenestrationRegistry(
            this.items.filter((_, i) => i !== index),
            this.minSpacingMm,
        ));
    }

    clear(): FenestrationRegistry {
        return FenestrationRegistry.empty(this.minSpacingMm);
    }
}
