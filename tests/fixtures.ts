/**
 * Shared test helpers.
 */
import { CatalogException, type CatalogErrorCode } from '../src/types/errors.js';
import { isBinary, type BinaryNode, type Formula } from '../src/types/formula.js';

/**
 * Run fn and return what it threw; fails the test when nothing is thrown
 */
export function catchError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (e) {
        return e;
    }
    throw new Error('Expected function to throw');
}

export function expectCatalogError(fn: () => unknown, code: CatalogErrorCode): CatalogException {
    const error = catchError(fn);
    expect(error).toBeInstanceOf(CatalogException);
    if (!(error instanceof CatalogException)) {
        throw new Error('Expected a CatalogException');
    }
    expect(error.code).toBe(code);
    return error;
}

export function asBinary(formula: Formula): BinaryNode {
    if (!isBinary(formula)) {
        throw new Error(`Expected a binary node, got ${formula.type}`);
    }
    return formula;
}
