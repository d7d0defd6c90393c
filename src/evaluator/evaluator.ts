/**
 * Truth-Table Evaluator
 *
 * Turns a formula into its truth table over a fixed variable count. Two
 * strategies produce identical tables:
 *   - per-assignment: interprets the tree once for each of the 2^n assignments
 *   - bitwise: evaluates all assignments at once on per-variable masks
 */

import type { Formula } from '../types/formula.js';
import { createInvalidVariableError } from '../types/errors.js';
import { TruthTable, assertVariableCount, fullMask } from './truthTable.js';

export type EvaluationMode = 'bitwise' | 'per-assignment';

export class TruthTableEvaluator {
    readonly variableCount: number;
    readonly mode: EvaluationMode;
    private readonly mask: number;
    private readonly variableMasks: readonly number[];

    constructor(variableCount: number, mode: EvaluationMode = 'bitwise') {
        assertVariableCount(variableCount);
        this.variableCount = variableCount;
        this.mode = mode;
        this.mask = fullMask(variableCount);
        this.variableMasks = buildVariableMasks(variableCount);
    }

    /** Evaluate using the configured mode */
    tableOf(formula: Formula): TruthTable {
        return this.mode === 'bitwise' ? this.evaluateBitwise(formula) : this.evaluate(formula);
    }

    /**
     * Evaluate once per assignment, assignment 0 first
     */
    evaluate(formula: Formula): TruthTable {
        const width = 1 << this.variableCount;
        let bits = 0;
        for (let assignment = 0; assignment < width; assignment++) {
            if (this.evaluateAt(formula, assignment)) {
                bits |= 1 << assignment;
            }
        }
        return new TruthTable(this.variableCount, bits);
    }

    /**
     * Output of the formula under a single assignment
     */
    evaluateAt(node: Formula, assignment: number): boolean {
        switch (node.type) {
            case 'variable':
                this.checkVariable(node.index);
                return ((assignment >>> node.index) & 1) === 1;
            case 'not':
                return !this.evaluateAt(node.operand, assignment);
            case 'and':
                return this.evaluateAt(node.left, assignment) && this.evaluateAt(node.right, assignment);
            case 'or':
                return this.evaluateAt(node.left, assignment) || this.evaluateAt(node.right, assignment);
            case 'xor':
                return this.evaluateAt(node.left, assignment) !== this.evaluateAt(node.right, assignment);
        }
    }

    /**
     * Evaluate every assignment in one pass over the tree
     */
    evaluateBitwise(formula: Formula): TruthTable {
        return new TruthTable(this.variableCount, this.bitsOf(formula));
    }

    private bitsOf(node: Formula): number {
        switch (node.type) {
            case 'variable':
                this.checkVariable(node.index);
                return this.variableMasks[node.index];
            case 'not':
                return (~this.bitsOf(node.operand) & this.mask) >>> 0;
            case 'and':
                return (this.bitsOf(node.left) & this.bitsOf(node.right)) >>> 0;
            case 'or':
                return (this.bitsOf(node.left) | this.bitsOf(node.right)) >>> 0;
            case 'xor':
                return (this.bitsOf(node.left) ^ this.bitsOf(node.right)) >>> 0;
        }
    }

    private checkVariable(index: number): void {
        if (index < 0 || index >= this.variableCount) {
            throw createInvalidVariableError(index, this.variableCount);
        }
    }
}

/**
 * Mask v has bit a set iff variable v is true under assignment a.
 * For n = 2: v0 = 0b1010, v1 = 0b1100.
 */
export function buildVariableMasks(variableCount: number): number[] {
    const width = 1 << variableCount;
    const masks: number[] = [];
    for (let v = 0; v < variableCount; v++) {
        let mask = 0;
        for (let a = 0; a < width; a++) {
            if ((a >>> v) & 1) mask |= 1 << a;
        }
        masks.push(mask >>> 0);
    }
    return masks;
}

export function createEvaluator(variableCount: number, mode?: EvaluationMode): TruthTableEvaluator {
    return new TruthTableEvaluator(variableCount, mode);
}
