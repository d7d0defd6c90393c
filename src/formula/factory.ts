import type { BinaryNode, BinaryOperator, Formula, NotNode, VariableNode } from '../types/formula.js';
import { createForeignFormulaError, createInvalidVariableError } from '../types/errors.js';
import { assertVariableCount } from '../evaluator/truthTable.js';

/**
 * Builds formula nodes for one variable count.
 *
 * Nodes are hash-consed: asking twice for the same tree returns the same
 * frozen node, so within one factory equal ids mean equal structure. Ids come
 * from a per-factory counter and double as a construction-order stamp.
 */
export class FormulaFactory {
    readonly variableCount: number;
    private nextId = 0;
    private readonly variables: VariableNode[] = [];
    private readonly negations = new Map<number, NotNode>();
    private readonly binaries = new Map<string, BinaryNode>();

    constructor(variableCount: number) {
        assertVariableCount(variableCount);
        this.variableCount = variableCount;
    }

    /** Number of distinct nodes built so far */
    get created(): number {
        return this.nextId;
    }

    /**
     * Whether this factory built the node (and therefore its subtrees)
     */
    owns(formula: Formula): boolean {
        switch (formula.type) {
            case 'variable':
                return this.variables[formula.index] === formula;
            case 'not':
                return this.negations.get(formula.operand.id) === formula;
            case 'and':
            case 'or':
            case 'xor':
                return this.binaries.get(binaryKey(formula.type, formula.left, formula.right)) === formula;
        }
    }

    variable(index: number): VariableNode {
        if (!Number.isInteger(index) || index < 0 || index >= this.variableCount) {
            throw createInvalidVariableError(index, this.variableCount);
        }
        const existing = this.variables[index];
        if (existing !== undefined) return existing;

        const node: VariableNode = Object.freeze({
            type: 'variable',
            id: this.nextId++,
            operatorCount: 0,
            index,
        });
        this.variables[index] = node;
        return node;
    }

    not(operand: Formula): NotNode {
        this.assertOwned(operand);
        const existing = this.negations.get(operand.id);
        if (existing !== undefined) return existing;

        const node: NotNode = Object.freeze({
            type: 'not',
            id: this.nextId++,
            operatorCount: operand.operatorCount,
            operand,
        });
        this.negations.set(operand.id, node);
        return node;
    }

    binary(operator: BinaryOperator, left: Formula, right: Formula): BinaryNode {
        this.assertOwned(left);
        this.assertOwned(right);
        const key = binaryKey(operator, left, right);
        const existing = this.binaries.get(key);
        if (existing !== undefined) return existing;

        const node: BinaryNode = Object.freeze({
            type: operator,
            id: this.nextId++,
            operatorCount: 1 + left.operatorCount + right.operatorCount,
            left,
            right,
        });
        this.binaries.set(key, node);
        return node;
    }

    and(left: Formula, right: Formula): BinaryNode {
        return this.binary('and', left, right);
    }

    or(left: Formula, right: Formula): BinaryNode {
        return this.binary('or', left, right);
    }

    xor(left: Formula, right: Formula): BinaryNode {
        return this.binary('xor', left, right);
    }

    private assertOwned(formula: Formula): void {
        if (!this.owns(formula)) {
            throw createForeignFormulaError(formula.id);
        }
    }
}

function binaryKey(operator: BinaryOperator, left: Formula, right: Formula): string {
    return `${operator}:${left.id}:${right.id}`;
}

export function createFormulaFactory(variableCount: number): FormulaFactory {
    return new FormulaFactory(variableCount);
}
