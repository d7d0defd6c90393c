import type { Formula } from '../types/formula.js';
import { createGenericError } from '../types/errors.js';

/**
 * Address of a formula inside the pool
 */
export interface FormulaRef {
    size: number;
    index: number;
}

/**
 * Arena of size-class buckets.
 *
 * Bucket k holds every generated formula with k binary operators, in
 * generation order. Buckets are appended whole and frozen; nothing is freed
 * during a run because larger classes reuse smaller ones as subtrees.
 */
export class SizeClassPool {
    private readonly buckets: (readonly Formula[])[] = [];

    /** Number of materialized size classes */
    get depth(): number {
        return this.buckets.length;
    }

    /** Total formulas held across all classes */
    get total(): number {
        let total = 0;
        for (const bucket of this.buckets) total += bucket.length;
        return total;
    }

    has(size: number): boolean {
        return size >= 0 && size < this.buckets.length;
    }

    /**
     * Append the next size class; classes must arrive in order
     */
    push(size: number, formulas: Formula[]): readonly Formula[] {
        if (size !== this.buckets.length) {
            throw createGenericError(
                'INVALID_OPTIONS',
                `Size class ${size} pushed out of order (next expected ${this.buckets.length})`,
                { size, expected: this.buckets.length }
            );
        }
        const frozen = Object.freeze(formulas);
        this.buckets.push(frozen);
        return frozen;
    }

    sizeClass(size: number): readonly Formula[] {
        const bucket = this.buckets[size];
        if (bucket === undefined) {
            throw createGenericError(
                'INVALID_OPTIONS',
                `Size class ${size} has not been generated`,
                { size, depth: this.buckets.length }
            );
        }
        return bucket;
    }

    at(ref: FormulaRef): Formula {
        const formula = this.sizeClass(ref.size)[ref.index];
        if (formula === undefined) {
            throw createGenericError(
                'INVALID_OPTIONS',
                `No formula at size ${ref.size}, index ${ref.index}`,
                { ...ref }
            );
        }
        return formula;
    }

    /** Populations of the materialized classes */
    counts(): number[] {
        return this.buckets.map(b => b.length);
    }
}
