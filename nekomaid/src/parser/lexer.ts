import { LexError } from "../types/errors.js";
import { PUNCTUATION, TokenKind, type SourceSpan, type Token } from "../types/token.js";
import { colorFromHex } from "../types/value.js";

interface Mark {
  offset: number;
  line: number;
  column: number;
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= "a" && ch <= "f") || (ch >= "A" && ch <= "F");
}

function isIdentStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isIdentChar(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch) || ch === "-";
}

/**
 * Lazily tokenizes NekoMaid UI source. Whitespace and `//` comments are
 * dropped; the sequence always ends with a single EOF token. Each call starts
 * a fresh pass over the source, so a reload simply calls it again.
 */
export function* tokenize(source: string): Generator<Token, void, undefined> {
  let pos = 0;
  let line = 1;
  let column = 1;

  function peek(): string {
    return source.charAt(pos);
  }

  function peekAt(offset: number): string {
    return source.charAt(pos + offset);
  }

  function advance(): string {
    const ch = source.charAt(pos);
    pos++;
    if (ch === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
    return ch;
  }

  function mark(): Mark {
    return { offset: pos, line, column };
  }

  function spanFrom(start: Mark): SourceSpan {
    return { line: start.line, column: start.column, offset: start.offset, length: pos - start.offset };
  }

  function pointSpan(length: number = 1): SourceSpan {
    return { line, column, offset: pos, length };
  }

  function skipTrivia(): void {
    while (pos < source.length) {
      const ch = peek();
      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        advance();
      } else if (ch === "/" && peekAt(1) === "/") {
        while (pos < source.length && peek() !== "\n") {
          advance();
        }
      } else {
        break;
      }
    }
  }

  function readString(delimiter: string): Token {
    const start = mark();
    advance(); // opening delimiter
    let value = "";
    while (pos < source.length) {
      const ch = peek();
      if (ch === delimiter) {
        advance();
        return { kind: TokenKind.STRING, value, span: spanFrom(start) };
      }
      if (ch === "\n" || ch === "\r") break;
      value += advance();
    }
    throw new LexError("Unterminated string", spanFrom(start), delimiter);
  }

  function readNumber(): Token {
    const start = mark();
    let text = "";
    let isFloat = false;

    if (peek() === "-") {
      text += advance();
    }
    while (isDigit(peek())) {
      text += advance();
    }

    if (peek() === ".") {
      if (!isDigit(peekAt(1))) {
        throw new LexError("Expected a digit after the decimal point", pointSpan(), ".");
      }
      isFloat = true;
      text += advance();
      while (isDigit(peek())) {
        text += advance();
      }
    }

    if (peek() === "%") {
      advance();
      return { kind: TokenKind.DIMENSION, value: text, unit: "%", span: spanFrom(start) };
    }
    if (peek() === "p" && peekAt(1) === "x" && !isIdentChar(peekAt(2))) {
      advance();
      advance();
      return { kind: TokenKind.DIMENSION, value: text, unit: "px", span: spanFrom(start) };
    }
    if (isIdentStart(peek())) {
      const unitStart = mark();
      let unit = "";
      while (isIdentChar(peek())) {
        unit += advance();
      }
      throw new LexError(`Unknown unit '${unit}' on number ${text}`, spanFrom(unitStart), unit);
    }

    if (isFloat) {
      return { kind: TokenKind.FLOAT, value: text, span: spanFrom(start) };
    }
    const span = spanFrom(start);
    if (!Number.isSafeInteger(Number(text))) {
      throw new LexError(`Integer literal ${text} is out of range`, span, text);
    }
    return { kind: TokenKind.INTEGER, value: text, span };
  }

  function readColor(): Token {
    const start = mark();
    advance(); // '#'
    let digits = "";
    while (isHexDigit(peek())) {
      digits += advance();
    }
    while (isIdentChar(peek())) {
      digits += advance();
    }

    const color = colorFromHex(digits);
    if (color === undefined) {
      throw new LexError(
        `Invalid color literal '#${digits}': expected 3, 4, 6 or 8 hex digits`,
        spanFrom(start),
        `#${digits}`,
      );
    }
    return { kind: TokenKind.COLOR, value: digits, color, span: spanFrom(start) };
  }

  function readWord(): string {
    let value = "";
    while (isIdentChar(peek())) {
      value += advance();
    }
    return value;
  }

  function readVariable(): Token {
    const start = mark();
    advance(); // '$'
    if (!isIdentStart(peek())) {
      throw new LexError("Expected a variable name after '$'", spanFrom(start), "$");
    }
    const name = readWord();
    return { kind: TokenKind.VARIABLE, value: name, span: spanFrom(start) };
  }

  function readIdentifierOrBoolean(): Token {
    const start = mark();
    const value = readWord();
    if (value === "true" || value === "false") {
      return { kind: TokenKind.BOOLEAN, value, span: spanFrom(start) };
    }
    return { kind: TokenKind.IDENTIFIER, value, span: spanFrom(start) };
  }

  while (true) {
    skipTrivia();
    if (pos >= source.length) break;

    const ch = peek();

    if (ch === '"' || ch === "'" || ch === "`") {
      yield readString(ch);
      continue;
    }

    if (isDigit(ch) || (ch === "-" && isDigit(peekAt(1)))) {
      yield readNumber();
      continue;
    }

    // .5 and -.5 are not numbers
    if ((ch === "." && isDigit(peekAt(1))) || (ch === "-" && peekAt(1) === "." && isDigit(peekAt(2)))) {
      throw new LexError("Number literal must start with a digit", pointSpan(), ch);
    }

    if (ch === "#") {
      yield readColor();
      continue;
    }

    if (ch === "$") {
      yield readVariable();
      continue;
    }

    if (isIdentStart(ch)) {
      yield readIdentifierOrBoolean();
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      const start = mark();
      advance();
      yield { kind: TokenKind.PUNCTUATION, value: ch, span: spanFrom(start) };
      continue;
    }

    throw new LexError(`Unexpected character '${ch}'`, pointSpan(), ch);
  }

  yield { kind: TokenKind.EOF, value: "", span: pointSpan(0) };
}

/** Eagerly collects every token, including the trailing EOF. */
export function tokenizeAll(source: string): Token[] {
  return [...tokenize(source)];
}
