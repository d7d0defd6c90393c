import type { Token, TokenType } from '../types/parser.js';
import { createParseError } from '../types/errors.js';

/**
 * Tokenizer for propositional formulas
 */
export class Tokenizer {
    private input: string;
    private pos: number = 0;
    private tokens: Token[] = [];

    constructor(input: string) {
        this.input = input;
    }

    tokenize(): Token[] {
        while (this.pos < this.input.length) {
            this.skipWhitespace();
            if (this.pos >= this.input.length) break;

            const char = this.input[this.pos];

            switch (char) {
                case '(': this.addToken('LPAREN', char); continue;
                case ')': this.addToken('RPAREN', char); continue;
                case '&': this.addToken('AND', char); continue;
                case '|': this.addToken('OR', char); continue;
                case '^': this.addToken('XOR', char); continue;
                case '~':
                case '-':
                case '!': this.addToken('NOT', char); continue;
            }

            if (/[a-zA-Z_]/.test(char)) {
                const start = this.pos;
                while (this.pos < this.input.length && /[a-zA-Z0-9_]/.test(this.input[this.pos])) {
                    this.pos++;
                }
                this.tokens.push({ type: 'NAME', value: this.input.slice(start, this.pos), position: start });
                continue;
            }

            throw createParseError(`Unexpected character '${char}'`, this.input, this.pos);
        }

        this.tokens.push({ type: 'EOF', value: '', position: this.pos });
        return this.tokens;
    }

    private skipWhitespace(): void {
        while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
            this.pos++;
        }
    }

    private addToken(type: TokenType, value: string): void {
        this.tokens.push({ type, value, position: this.pos });
        this.pos += value.length;
    }
}
