import { NEGATION_SYMBOL, OPERATOR_SYMBOLS, type Formula } from '../types/formula.js';
import { createInvalidVariableError } from '../types/errors.js';

/**
 * Default display names: p1..pn
 */
export function defaultVariableNames(variableCount: number): string[] {
    return Array.from({ length: variableCount }, (_, i) => `p${i + 1}`);
}

/**
 * Pretty-print a formula. Nested binaries are parenthesized, the outermost is not.
 */
export function formulaToString(node: Formula, names: readonly string[]): string {
    return render(node, names, false);
}

function render(node: Formula, names: readonly string[], nested: boolean): string {
    switch (node.type) {
        case 'variable': {
            const name = names[node.index];
            if (name === undefined) {
                throw createInvalidVariableError(node.index, names.length);
            }
            return name;
        }
        case 'not':
            return `${NEGATION_SYMBOL}${render(node.operand, names, true)}`;
        case 'and':
        case 'or':
        case 'xor': {
            const text = `${render(node.left, names, true)} ${OPERATOR_SYMBOLS[node.type]} ${render(node.right, names, true)}`;
            return nested ? `(${text})` : text;
        }
    }
}
