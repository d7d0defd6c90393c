/**
 * Structural (syntactic) comparison of formulas.
 * Semantic equivalence is the catalog's concern and goes through truth tables.
 */

import { isBinary, type Formula } from '../types/formula.js';

/**
 * Check whether two formulas have the same tree shape, ignoring ids
 */
export function sameStructure(a: Formula, b: Formula): boolean {
    if (a === b) return true;
    switch (a.type) {
        case 'variable':
            return b.type === 'variable' && a.index === b.index;
        case 'not':
            return b.type === 'not' && sameStructure(a.operand, b.operand);
        case 'and':
        case 'or':
        case 'xor':
            return isBinary(b) && b.type === a.type &&
                sameStructure(a.left, b.left) &&
                sameStructure(a.right, b.right);
    }
}

/**
 * Canonical prefix key for a tree shape; equal keys mean equal structure
 */
export function structuralKey(node: Formula): string {
    switch (node.type) {
        case 'variable':
            return `v${node.index}`;
        case 'not':
            return `~${structuralKey(node.operand)}`;
        case 'and':
        case 'or':
        case 'xor':
            return `${node.type}(${structuralKey(node.left)},${structuralKey(node.right)})`;
    }
}

/**
 * Recount binary connectives by walking the tree
 */
export function countBinaryOperators(node: Formula): number {
    switch (node.type) {
        case 'variable':
            return 0;
        case 'not':
            return countBinaryOperators(node.operand);
        case 'and':
        case 'or':
        case 'xor':
            return 1 + countBinaryOperators(node.left) + countBinaryOperators(node.right);
    }
}
