import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  STRING: 'STRING', // "..." (raw body, interpolated by the parser)
  LITERAL_STRING: 'LITERAL_STRING', // '...'
  NUMBER: 'NUMBER',
  TRUE: 'TRUE',
  FALSE: 'FALSE',

  // Names
  IDENTIFIER: 'IDENTIFIER', // Where-Object, Add, Name
  VARIABLE: 'VARIABLE', // $name, $global:name, $_
  PARAMETER: 'PARAMETER', // -Property

  // Arithmetic
  PLUS: 'PLUS',
  MINUS: 'MINUS',
  STAR: 'STAR',
  SLASH: 'SLASH',
  PERCENT: 'PERCENT',

  // Assignment
  ASSIGN: 'ASSIGN', // =
  PLUS_ASSIGN: 'PLUS_ASSIGN', // +=
  MINUS_ASSIGN: 'MINUS_ASSIGN', // -=
  STAR_ASSIGN: 'STAR_ASSIGN', // *=
  SLASH_ASSIGN: 'SLASH_ASSIGN', // /=
  PERCENT_ASSIGN: 'PERCENT_ASSIGN', // %=

  // Dash operators
  EQ: 'EQ', // -eq
  NE: 'NE', // -ne
  GT: 'GT', // -gt
  LT: 'LT', // -lt
  GE: 'GE', // -ge
  LE: 'LE', // -le
  AND: 'AND', // -and
  OR: 'OR', // -or
  NOT: 'NOT', // -not
  BANG: 'BANG', // !

  // Punctuation
  PIPE: 'PIPE', // |
  COMMA: 'COMMA',
  SEMICOLON: 'SEMICOLON',
  DOT: 'DOT',
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  LBRACE: 'LBRACE',
  RBRACE: 'RBRACE',
  LBRACKET: 'LBRACKET',
  RBRACKET: 'RBRACKET',
  AT_LPAREN: 'AT_LPAREN', // @(
  AT_LBRACE: 'AT_LBRACE', // @{
  DOLLAR_LPAREN: 'DOLLAR_LPAREN', // $(

  // Keywords
  FUNCTION: 'FUNCTION',
  IF: 'IF',
  ELSEIF: 'ELSEIF',
  ELSE: 'ELSE',
  RETURN: 'RETURN',
  PARAM: 'PARAM',

  // Structure
  NEWLINE: 'NEWLINE',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}
