import { createGenericError } from '../types/errors.js';

export const MAX_VARIABLES = 5;

export type Bit = 0 | 1;

/**
 * Complete input→output mapping of a formula over a fixed number of variables.
 *
 * Bit `a` of `bits` is the output under assignment `a`; variable `v` takes the
 * value of bit `v` of `a`. With at most 5 variables the table fits in an
 * unsigned 32-bit integer.
 */
export class TruthTable {
    readonly variableCount: number;
    readonly width: number;
    readonly bits: number;

    constructor(variableCount: number, bits: number) {
        assertVariableCount(variableCount);
        this.variableCount = variableCount;
        this.width = 1 << variableCount;
        this.bits = (bits & fullMask(variableCount)) >>> 0;
    }

    static fromArray(variableCount: number, outputs: readonly Bit[]): TruthTable {
        const width = 1 << variableCount;
        if (outputs.length !== width) {
            throw createGenericError(
                'WIDTH_MISMATCH',
                `Expected ${width} outputs for ${variableCount} variable(s), got ${outputs.length}`,
                { variableCount, length: outputs.length }
            );
        }
        let bits = 0;
        outputs.forEach((out, a) => {
            if (out === 1) bits |= 1 << a;
        });
        return new TruthTable(variableCount, bits);
    }

    get(assignment: number): Bit {
        return ((this.bits >>> assignment) & 1) === 1 ? 1 : 0;
    }

    toArray(): Bit[] {
        const out: Bit[] = [];
        for (let a = 0; a < this.width; a++) {
            out.push(this.get(a));
        }
        return out;
    }

    /** Outputs as a bit string, assignment 0 first */
    toString(): string {
        return this.toArray().join('');
    }

    equals(other: TruthTable): boolean {
        return this.variableCount === other.variableCount && this.bits === other.bits;
    }
}

/**
 * Mask with the low 2^n bits set.
 */
export function fullMask(variableCount: number): number {
    const width = 1 << variableCount;
    // 1 << 32 wraps to 1 in JS, so the 5-variable table is special-cased
    return width === 32 ? 0xffffffff : (1 << width) - 1;
}

/**
 * Number of distinct boolean functions over n variables: 2^(2^n).
 */
export function countPossibleTables(variableCount: number): number {
    return 2 ** (1 << variableCount);
}

export function assertVariableCount(variableCount: number): void {
    if (!Number.isInteger(variableCount) || variableCount < 1 || variableCount > MAX_VARIABLES) {
        throw createGenericError(
            'INVALID_OPTIONS',
            `Variable count must be an integer from 1 to ${MAX_VARIABLES}, got ${variableCount}`,
            { variableCount }
        );
    }
}
