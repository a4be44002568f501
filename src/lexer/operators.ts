/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '+=': TOKEN_TYPES.PLUS_ASSIGN,
  '-=': TOKEN_TYPES.MINUS_ASSIGN,
  '*=': TOKEN_TYPES.STAR_ASSIGN,
  '/=': TOKEN_TYPES.SLASH_ASSIGN,
  '%=': TOKEN_TYPES.PERCENT_ASSIGN,
  '@(': TOKEN_TYPES.AT_LPAREN,
  '@{': TOKEN_TYPES.AT_LBRACE,
  '$(': TOKEN_TYPES.DOLLAR_LPAREN,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '!': TOKEN_TYPES.BANG,
  '=': TOKEN_TYPES.ASSIGN,
  '|': TOKEN_TYPES.PIPE,
  ',': TOKEN_TYPES.COMMA,
  ';': TOKEN_TYPES.SEMICOLON,
  '.': TOKEN_TYPES.DOT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
};

/** Dash operators (-eq, -and, ...), matched case-insensitively */
export const DASH_OPERATORS: Record<string, TokenType> = {
  eq: TOKEN_TYPES.EQ,
  ne: TOKEN_TYPES.NE,
  gt: TOKEN_TYPES.GT,
  lt: TOKEN_TYPES.LT,
  ge: TOKEN_TYPES.GE,
  le: TOKEN_TYPES.LE,
  and: TOKEN_TYPES.AND,
  or: TOKEN_TYPES.OR,
  not: TOKEN_TYPES.NOT,
};

/** Keyword lookup table, matched case-insensitively */
export const KEYWORDS: Record<string, TokenType> = {
  function: TOKEN_TYPES.FUNCTION,
  if: TOKEN_TYPES.IF,
  elseif: TOKEN_TYPES.ELSEIF,
  else: TOKEN_TYPES.ELSE,
  return: TOKEN_TYPES.RETURN,
  param: TOKEN_TYPES.PARAM,
  true: TOKEN_TYPES.TRUE,
  false: TOKEN_TYPES.FALSE,
};
