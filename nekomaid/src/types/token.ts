import type { ColorValue } from "./value.js";

export const TokenKind = {
  STRING: "string",
  INTEGER: "integer",
  FLOAT: "float",
  DIMENSION: "dimension",
  COLOR: "color",
  BOOLEAN: "boolean",
  IDENTIFIER: "identifier",
  VARIABLE: "variable",
  PUNCTUATION: "punctuation",
  EOF: "eof",
} as const;

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind];

export type DimensionUnit = "px" | "%";

export interface SourceSpan {
  line: number;
  column: number;
  offset: number;
  length: number;
}

interface BaseToken {
  value: string;
  span: SourceSpan;
}

export interface StringToken extends BaseToken {
  kind: typeof TokenKind.STRING;
}

export interface IntegerToken extends BaseToken {
  kind: typeof TokenKind.INTEGER;
}

export interface FloatToken extends BaseToken {
  kind: typeof TokenKind.FLOAT;
}

export interface DimensionToken extends BaseToken {
  kind: typeof TokenKind.DIMENSION;
  unit: DimensionUnit;
}

export interface ColorToken extends BaseToken {
  kind: typeof TokenKind.COLOR;
  color: ColorValue;
}

export interface BooleanToken extends BaseToken {
  kind: typeof TokenKind.BOOLEAN;
}

export interface IdentifierToken extends BaseToken {
  kind: typeof TokenKind.IDENTIFIER;
}

export interface VariableToken extends BaseToken {
  kind: typeof TokenKind.VARIABLE;
}

export interface PunctuationToken extends BaseToken {
  kind: typeof TokenKind.PUNCTUATION;
}

export interface EofToken extends BaseToken {
  kind: typeof TokenKind.EOF;
}

export type Token =
  | StringToken
  | IntegerToken
  | FloatToken
  | DimensionToken
  | ColorToken
  | BooleanToken
  | IdentifierToken
  | VariableToken
  | PunctuationToken
  | EofToken;

export const PUNCTUATION = new Set(["{", "}", "[", "]", "(", ")", ":", ";", ",", "=", "+", "!", "*"]);

/** Short human-readable description of a token, used in "found ..." messages. */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case TokenKind.EOF:
      return "end of input";
    case TokenKind.PUNCTUATION:
      return `'${token.value}'`;
    case TokenKind.STRING:
      return `string "${token.value}"`;
    case TokenKind.DIMENSION:
      return `${token.kind} ${token.value}${token.unit}`;
    case TokenKind.COLOR:
      return `color #${token.value}`;
    case TokenKind.VARIABLE:
      return `variable $${token.value}`;
    default:
      return `${token.kind} '${token.value}'`;
  }
}
