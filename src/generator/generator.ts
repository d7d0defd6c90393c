/**
 * Formula Generator
 *
 * Enumerates every formula over n variables in non-decreasing operator count.
 * A formula of size k is an operator applied to a size-i left subtree and a
 * size-(k-1-i) right subtree, optionally negated. No pruning happens here:
 * commuted, idempotent or otherwise equivalent trees are all emitted and the
 * catalog groups them by truth table.
 */

import { BINARY_OPERATORS, type BinaryOperator, type Formula } from '../types/formula.js';
import { FormulaFactory } from '../formula/factory.js';
import { SizeClassPool } from './pool.js';
import { nextClassSize } from './tractability.js';

export class FormulaGenerator {
    readonly factory: FormulaFactory;
    readonly pool: SizeClassPool;
    readonly operators: readonly BinaryOperator[];

    constructor(
        factory: FormulaFactory,
        operators: readonly BinaryOperator[] = BINARY_OPERATORS,
        pool: SizeClassPool = new SizeClassPool()
    ) {
        this.factory = factory;
        this.operators = operators;
        this.pool = pool;
    }

    get variableCount(): number {
        return this.factory.variableCount;
    }

    /**
     * Population the given size class has (or will have once built)
     */
    classSize(size: number): number {
        if (this.pool.has(size)) return this.pool.sizeClass(size).length;
        if (size === 0) return 2 * this.variableCount;
        if (!this.pool.has(size - 1)) {
            // The recurrence needs every smaller class; fall back to building them
            this.sizeClass(size - 1);
        }
        return nextClassSize(this.pool.counts().slice(0, size), this.operators.length);
    }

    /**
     * Materialize (once) and return the size class, building smaller classes first
     */
    sizeClass(size: number): readonly Formula[] {
        while (!this.pool.has(size)) {
            const next = this.pool.depth;
            this.pool.push(next, next === 0 ? this.buildLiterals() : this.buildCombinations(next));
        }
        return this.pool.sizeClass(size);
    }

    /**
     * Lazily yield every formula of size 0..maxSize in generation order.
     * Each call starts over; classes built by an earlier pass are reused.
     */
    *formulas(maxSize: number): Generator<Formula> {
        for (let size = 0; size <= maxSize; size++) {
            yield* this.sizeClass(size);
        }
    }

    private buildLiterals(): Formula[] {
        const literals: Formula[] = [];
        for (let v = 0; v < this.variableCount; v++) {
            const variable = this.factory.variable(v);
            literals.push(variable, this.factory.not(variable));
        }
        return literals;
    }

    private buildCombinations(size: number): Formula[] {
        const built: Formula[] = [];
        for (const operator of this.operators) {
            for (let i = 0; i < size; i++) {
                const lefts = this.pool.sizeClass(i);
                const rights = this.pool.sizeClass(size - 1 - i);
                for (const left of lefts) {
                    for (const right of rights) {
                        const combined = this.factory.binary(operator, left, right);
                        built.push(combined, this.factory.not(combined));
                    }
                }
            }
        }
        return built;
    }
}

export function createGenerator(variableCount: number): FormulaGenerator {
    return new FormulaGenerator(new FormulaFactory(variableCount));
}
