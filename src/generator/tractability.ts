/**
 * Size-class population estimates.
 *
 * |class 0| = 2n (every variable and its negation)
 * |class k| = 2 · ops · Σ_{i<k} |class i| · |class k-1-i|
 *
 * The factor 2 is the optional negation of each combined formula.
 */

import { BINARY_OPERATORS } from '../types/formula.js';
import { createGenericError } from '../types/errors.js';

export interface SizeClassEstimate {
    size: number;
    count: number;
    cumulative: number;
}

/**
 * Population of the next size class given the populations of all smaller ones
 */
export function nextClassSize(
    previous: readonly number[],
    operatorCount: number = BINARY_OPERATORS.length
): number {
    const k = previous.length;
    if (k === 0) {
        throw createGenericError('INVALID_OPTIONS', 'Class 0 depends on the variable count, not on earlier classes');
    }
    let pairs = 0;
    for (let i = 0; i < k; i++) {
        pairs += previous[i] * previous[k - 1 - i];
    }
    return 2 * operatorCount * pairs;
}

/**
 * Populations of classes 0..maxSize for n variables
 */
export function estimateClassSizes(variableCount: number, maxSize: number): SizeClassEstimate[] {
    const counts: number[] = [];
    const estimates: SizeClassEstimate[] = [];
    let cumulative = 0;
    for (let size = 0; size <= maxSize; size++) {
        const count = size === 0 ? 2 * variableCount : nextClassSize(counts);
        counts.push(count);
        cumulative += count;
        estimates.push({ size, count, cumulative });
    }
    return estimates;
}

/**
 * Largest size ceiling whose cumulative population stays within the budget
 */
export function largestSizeWithin(variableCount: number, maxFormulas: number, hardLimit: number = 16): number {
    let best = -1;
    for (const { size, cumulative } of estimateClassSizes(variableCount, hardLimit)) {
        if (cumulative > maxFormulas) break;
        best = size;
    }
    return best;
}
