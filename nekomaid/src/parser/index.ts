import { tokenize } from "./lexer.js";
import { parseTokens, type ParseOptions, type ParseResult } from "./parser.js";

export { tokenize, tokenizeAll } from "./lexer.js";
export { parseTokens } from "./parser.js";
export type { ParseOptions, ParseResult } from "./parser.js";
export { predictImports } from "./imports.js";
export { LexError, ParseError } from "../types/errors.js";

/** Lexes and parses NekoMaid UI source in one pass. */
export function parseSource(source: string, options?: ParseOptions): ParseResult {
  return parseTokens(tokenize(source), options);
}
