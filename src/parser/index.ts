import type { Formula } from '../types/formula.js';
import { FormulaFactory } from '../formula/factory.js';
import { defaultVariableNames } from '../formula/printer.js';
import { Tokenizer } from './tokenizer.js';
import { Parser } from './parser.js';

export { Tokenizer } from './tokenizer.js';
export { Parser } from './parser.js';

/**
 * Parse a propositional formula over the given variable names.
 * Names default to p1..pn of the factory's variable count.
 */
export function parse(
    input: string,
    factory: FormulaFactory,
    names: readonly string[] = defaultVariableNames(factory.variableCount)
): Formula {
    const tokenizer = new Tokenizer(input);
    const tokens = tokenizer.tokenize();
    const parser = new Parser(tokens, input, factory, names);
    return parser.parse();
}
