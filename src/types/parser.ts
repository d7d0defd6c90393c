/**
 * Parser Types
 */

export type TokenType =
    | 'NAME'          // p1, a, x2 (variable names)
    | 'AND'           // &
    | 'OR'            // |
    | 'XOR'           // ^
    | 'NOT'           // ~, -, !
    | 'LPAREN'        // (
    | 'RPAREN'        // )
    | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    position: number;
}
