import { parse, Tokenizer } from '../src/parser/index.js';
import { FormulaFactory } from '../src/formula/factory.js';
import { formulaToString } from '../src/formula/printer.js';
import { createEvaluator } from '../src/evaluator/evaluator.js';
import { expectCatalogError } from './fixtures.js';

const NAMES = ['a', 'b'];

describe('Tokenizer', () => {
    test('tokenizes connectives and names', () => {
        const tokens = new Tokenizer('a ^ ~b').tokenize();
        expect(tokens.map(t => t.type)).toEqual(['NAME', 'XOR', 'NOT', 'NAME', 'EOF']);
        expect(tokens.map(t => t.position)).toEqual([0, 2, 4, 5, 6]);
    });

    test('accepts ~, - and ! for negation', () => {
        expect(new Tokenizer('~-!x_1').tokenize().map(t => t.type)).toEqual(['NOT', 'NOT', 'NOT', 'NAME', 'EOF']);
    });

    test('rejects unknown characters', () => {
        const error = expectCatalogError(() => new Tokenizer('a @ b').tokenize(), 'PARSE_ERROR');
        expect(error.message).toBe("Unexpected character '@'");
        expect(error.error.span?.start).toBe(2);
    });
});

describe('Parser', () => {
    let factory: FormulaFactory;
    const show = (input: string) => formulaToString(parse(input, factory, NAMES), NAMES);

    beforeEach(() => {
        factory = new FormulaFactory(2);
    });

    test('parses binary connectives', () => {
        const formula = parse('a & b', factory, NAMES);
        expect(formula.type).toBe('and');
        expect(formula.operatorCount).toBe(1);
        expect(parse('a | b', factory, NAMES).type).toBe('or');
        expect(parse('a ^ b', factory, NAMES).type).toBe('xor');
    });

    test('binds & tighter than ^ tighter than |', () => {
        expect(show('a | b ^ a & b')).toBe('a | (b ^ (a & b))');
        expect(show('a & b | a')).toBe('(a & b) | a');
    });

    test('binary connectives associate to the left', () => {
        expect(show('a & b & a')).toBe('(a & b) & a');
        expect(show('a ^ b ^ a')).toBe('(a ^ b) ^ a');
    });

    test('parentheses override precedence', () => {
        expect(show('(a | b) & a')).toBe('(a | b) & a');
        expect(show('~(a | b)')).toBe('~(a | b)');
    });

    test('negation spellings build the same tree', () => {
        expect(show('-a')).toBe('~a');
        expect(show('!a')).toBe('~a');
        expect(show('~~a')).toBe('~~a');
        expect(parse('~a', factory, NAMES).operatorCount).toBe(0);
    });

    test('double negation evaluates like the operand', () => {
        const evaluator = createEvaluator(2);
        expect(evaluator.tableOf(parse('~~a', factory, NAMES)).toString()).toBe('0101');
    });

    test('names default to p1..pn', () => {
        expect(formulaToString(parse('p1 ^ p2', factory), ['p1', 'p2'])).toBe('p1 ^ p2');
    });

    test('unknown variable names are rejected', () => {
        const error = expectCatalogError(() => parse('a & c', factory, NAMES), 'INVALID_VARIABLE');
        expect(error.message).toBe("Unknown variable 'c'");
        expect(error.error.context).toBe('a & c');
    });

    test('reports a missing right operand', () => {
        const error = expectCatalogError(() => parse('a &', factory, NAMES), 'PARSE_ERROR');
        expect(error.message).toBe('Unexpected end of formula');
        expect(error.error.span?.start).toBe(3);
        expect(error.error.suggestion).toBe("Incomplete conjunction - missing right operand after '&'");
    });

    test('reports a missing closing parenthesis', () => {
        const error = expectCatalogError(() => parse('(a | b', factory, NAMES), 'PARSE_ERROR');
        expect(error.message).toBe('Expected RPAREN but got EOF');
        expect(error.error.suggestion).toBe("Unbalanced parentheses - missing closing ')'");
    });

    test('reports empty input and trailing tokens', () => {
        expect(expectCatalogError(() => parse('   ', factory, NAMES), 'PARSE_ERROR').message).toBe('Empty formula');
        expect(expectCatalogError(() => parse('a b', factory, NAMES), 'PARSE_ERROR').message)
            .toBe("Unexpected token 'b'");
        expect(expectCatalogError(() => parse('a | )', factory, NAMES), 'PARSE_ERROR').message)
            .toBe("Unexpected token ')'");
    });
});
