import type { BinaryOperator, Formula } from '../types/formula.js';
import type { Token, TokenType } from '../types/parser.js';
import type { FormulaFactory } from '../formula/factory.js';
import { createInvalidVariableError, createParseError } from '../types/errors.js';

const BINARY_TOKENS: Readonly<Record<'OR' | 'XOR' | 'AND', BinaryOperator>> = {
    OR: 'or',
    XOR: 'xor',
    AND: 'and',
};

/**
 * Parser for propositional formulas
 *
 * Grammar (EBNF-ish), binaries left-associative:
 *   formula     = disjunction
 *   disjunction = exclusive (('|' exclusive)*)
 *   exclusive   = conjunction (('^' conjunction)*)
 *   conjunction = unary (('&' unary)*)
 *   unary       = ('~' | '-' | '!') unary | atom
 *   atom        = NAME | '(' formula ')'
 */
export class Parser {
    private tokens: Token[];
    private originalInput: string;
    private factory: FormulaFactory;
    private names: readonly string[];
    private pos: number = 0;

    constructor(tokens: Token[], originalInput: string, factory: FormulaFactory, names: readonly string[]) {
        this.tokens = tokens;
        this.originalInput = originalInput;
        this.factory = factory;
        this.names = names;
    }

    parse(): Formula {
        if (this.current().type === 'EOF') {
            throw createParseError('Empty formula', this.originalInput, this.current().position);
        }
        const result = this.parseBinary('OR');
        if (this.current().type !== 'EOF') {
            throw createParseError(
                `Unexpected token '${this.current().value}'`,
                this.originalInput,
                this.current().position
            );
        }
        return result;
    }

    private current(): Token {
        return this.tokens[this.pos] || { type: 'EOF', value: '', position: this.originalInput.length };
    }

    private advance(): Token {
        const token = this.current();
        this.pos++;
        return token;
    }

    private expect(type: TokenType): Token {
        if (this.current().type !== type) {
            throw createParseError(
                `Expected ${type} but got ${this.current().type}`,
                this.originalInput,
                this.current().position
            );
        }
        return this.advance();
    }

    private parseBinary(level: 'OR' | 'XOR' | 'AND'): Formula {
        const operand = (): Formula =>
            level === 'OR' ? this.parseBinary('XOR')
                : level === 'XOR' ? this.parseBinary('AND')
                    : this.parseUnary();

        let left = operand();
        while (this.current().type === level) {
            this.advance();
            const right = operand();
            left = this.factory.binary(BINARY_TOKENS[level], left, right);
        }
        return left;
    }

    private parseUnary(): Formula {
        if (this.current().type === 'NOT') {
            this.advance();
            return this.factory.not(this.parseUnary());
        }
        return this.parseAtom();
    }

    private parseAtom(): Formula {
        if (this.current().type === 'LPAREN') {
            this.advance();
            const formula = this.parseBinary('OR');
            this.expect('RPAREN');
            return formula;
        }

        if (this.current().type === 'NAME') {
            const token = this.advance();
            const index = this.names.indexOf(token.value);
            if (index < 0) {
                throw createInvalidVariableError(token.value, this.names.length, this.originalInput);
            }
            return this.factory.variable(index);
        }

        throw createParseError(
            this.current().type === 'EOF'
                ? 'Unexpected end of formula'
                : `Unexpected token '${this.current().value}'`,
            this.originalInput,
            this.current().position
        );
    }
}
