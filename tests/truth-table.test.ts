import { TruthTable, countPossibleTables, fullMask } from '../src/evaluator/truthTable.js';
import { expectCatalogError } from './fixtures.js';

describe('TruthTable', () => {
    test('reads outputs with assignment 0 first', () => {
        const table = new TruthTable(2, 0b1000);
        expect(table.width).toBe(4);
        expect(table.toArray()).toEqual([0, 0, 0, 1]);
        expect(table.toString()).toBe('0001');
        expect(table.get(3)).toBe(1);
        expect(table.get(0)).toBe(0);
    });

    test('fromArray packs outputs into bits', () => {
        expect(TruthTable.fromArray(2, [0, 1, 1, 0]).bits).toBe(6);
        expect(TruthTable.fromArray(1, [1, 1]).bits).toBe(3);
    });

    test('fromArray rejects the wrong number of outputs', () => {
        const error = expectCatalogError(() => TruthTable.fromArray(2, [0, 1]), 'WIDTH_MISMATCH');
        expect(error.message).toBe('Expected 4 outputs for 2 variable(s), got 2');
    });

    test('drops bits beyond the table width', () => {
        expect(new TruthTable(1, 0b111).bits).toBe(3);
    });

    test('holds a full five-variable table as an unsigned value', () => {
        const table = new TruthTable(5, 0xffffffff);
        expect(table.bits).toBe(4294967295);
        expect(table.get(31)).toBe(1);
        expect(table.width).toBe(32);
        expect(TruthTable.fromArray(5, new Array<0 | 1>(32).fill(1)).bits).toBe(4294967295);
    });

    test('equals compares variable count and bits', () => {
        expect(new TruthTable(2, 6).equals(new TruthTable(2, 6))).toBe(true);
        expect(new TruthTable(2, 6).equals(new TruthTable(3, 6))).toBe(false);
        expect(new TruthTable(2, 6).equals(new TruthTable(2, 7))).toBe(false);
    });

    test('rejects variable counts outside 1..5', () => {
        expectCatalogError(() => new TruthTable(0, 0), 'INVALID_OPTIONS');
        const error = expectCatalogError(() => new TruthTable(6, 0), 'INVALID_OPTIONS');
        expect(error.message).toBe('Variable count must be an integer from 1 to 5, got 6');
    });
});

describe('table arithmetic', () => {
    test('fullMask sets the low 2^n bits', () => {
        expect(fullMask(1)).toBe(3);
        expect(fullMask(3)).toBe(255);
        expect(fullMask(5)).toBe(4294967295);
    });

    test('countPossibleTables is 2^(2^n)', () => {
        expect(countPossibleTables(1)).toBe(4);
        expect(countPossibleTables(2)).toBe(16);
        expect(countPossibleTables(3)).toBe(256);
        expect(countPossibleTables(5)).toBe(4294967296);
    });
});
