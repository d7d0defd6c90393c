/**
 * Formula tree types
 */

export type BinaryOperator = 'and' | 'or' | 'xor';

export type FormulaType = 'variable' | 'not' | BinaryOperator;

/** Connectives the generator combines, in generation order. */
export const BINARY_OPERATORS: readonly BinaryOperator[] = ['and', 'or', 'xor'];

export const OPERATOR_SYMBOLS: Readonly<Record<BinaryOperator, string>> = {
    and: '&',
    or: '|',
    xor: '^',
};

export const NEGATION_SYMBOL = '~';

interface FormulaBase {
    /** Unique per factory, increasing in construction order */
    readonly id: number;
    /** Number of binary connectives; negation is free */
    readonly operatorCount: number;
}

export interface VariableNode extends FormulaBase {
    readonly type: 'variable';
    readonly index: number;
}

export interface NotNode extends FormulaBase {
    readonly type: 'not';
    readonly operand: Formula;
}

export interface BinaryNode extends FormulaBase {
    readonly type: BinaryOperator;
    readonly left: Formula;
    readonly right: Formula;
}

export type Formula = VariableNode | NotNode | BinaryNode;

export function isBinary(node: Formula): node is BinaryNode {
    return node.type !== 'variable' && node.type !== 'not';
}
