import { Position } from './position';

// A Token represents a Lua lexical token.
export enum Token {
  // illegal token
  ILLEGAL = 'illegal token',
  // end of file
  EOF = 'end of file',
  // identifier
  IDENT = 'identifier',
  // number literal
  NUMBER = 'number literal',
  // string literal
  STRING = 'string literal',
  // +
  PLUS = '+',
  // -
  MINUS = '-',
  // *
  STAR = '*',
  // /
  SLASH = '/',
  // %
  PERCENT = '%',
  // ^
  CARET = '^',
  // #
  HASH = '#',
  // ==
  EQL = '==',
  // ~=
  NEQ = '~=',
  // <=
  LE = '<=',
  // >=
  GE = '>=',
  // <
  LT = '<',
  // >
  GT = '>',
  // =
  EQ = '=',
  // (
  LPAREN = '(',
  // )
  RPAREN = ')',
  // {
  LBRACE = '{',
  // }
  RBRACE = '}',
  // [
  LBRACK = '[',
  // ]
  RBRACK = ']',
  // ;
  SEMI = ';',
  // :
  COLON = ':',
  // ,
  COMMA = ',',
  // .
  DOT = '.',
  // ..
  DOTDOT = '..',
  // ...
  ELLIPSIS = '...',
  // Luau compound assignment operators
  PLUS_EQ = '+=',
  MINUS_EQ = '-=',
  STAR_EQ = '*=',
  SLASH_EQ = '/=',
  PERCENT_EQ = '%=',
  CARET_EQ = '^=',
  DOTDOT_EQ = '..=',
  // keywords
  AND = 'and',
  BREAK = 'break',
  CONTINUE = 'continue',
  DO = 'do',
  ELSE = 'else',
  ELSEIF = 'elseif',
  END = 'end',
  FALSE = 'false',
  FOR = 'for',
  FUNCTION = 'function',
  IF = 'if',
  IN = 'in',
  LOCAL = 'local',
  NIL = 'nil',
  NOT = 'not',
  OR = 'or',
  REPEAT = 'repeat',
  RETURN = 'return',
  THEN = 'then',
  TRUE = 'true',
  UNTIL = 'until',
  WHILE = 'while',
}

export const keywordToken: Record<string, Token> = {
  and: Token.AND,
  break: Token.BREAK,
  do: Token.DO,
  else: Token.ELSE,
  elseif: Token.ELSEIF,
  end: Token.END,
  false: Token.FALSE,
  for: Token.FOR,
  function: Token.FUNCTION,
  if: Token.IF,
  in: Token.IN,
  local: Token.LOCAL,
  nil: Token.NIL,
  not: Token.NOT,
  or: Token.OR,
  repeat: Token.REPEAT,
  return: Token.RETURN,
  then: Token.THEN,
  true: Token.TRUE,
  until: Token.UNTIL,
  while: Token.WHILE,
};

// Reserved words of every dialect; the renamer never produces one.
export const reservedWords: ReadonlySet<string> = new Set([
  ...Object.keys(keywordToken),
  'continue',
  'goto',
]);

// isReserved reports whether s may not be used as a variable name.
export function isReserved(s: string): boolean {
  return reservedWords.has(s);
}

// A Dialect selects the language variant accepted by the scanner and parser.
export enum Dialect {
  Lua51 = 'Lua51',
  LuaU = 'LuaU',
}

// dialectFeatures lists what a dialect adds on top of Lua 5.1.
export interface DialectFeatures {
  // continue is a statement
  continueStatement: boolean;
  // += -= *= /= %= ^= ..=
  compoundAssignment: boolean;
}

export function dialectFeatures(d: Dialect): DialectFeatures {
  switch (d) {
    case Dialect.Lua51:
      return { continueStatement: false, compoundAssignment: false };
    case Dialect.LuaU:
      return { continueStatement: true, compoundAssignment: true };
  }
}

// TokenValue records the position and value associated with each token.
export class TokenValue {
  raw: string; // raw text of token
  number: number; // decoded number
  string: string; // decoded string, one char per byte
  pos: Position; // start position of token

  constructor(raw = '', num = 0, str = '', pos: Position = Position.synthetic()) {
    this.raw = raw;
    this.number = num;
    this.string = str;
    this.pos = pos;
  }
}
