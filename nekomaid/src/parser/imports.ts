import { tokenize } from "./lexer.js";
import { TokenKind, type Token } from "../types/token.js";
import { LexError } from "../types/errors.js";

/**
 * Lists the style guides a source file imports by scanning for
 * `import "<name>"` token pairs, without parsing. Lets a loader fetch the
 * guides before the full parse. Not guaranteed accurate on malformed input:
 * scanning stops quietly at the first lexer error.
 */
export function predictImports(source: string): string[] {
  const imports: string[] = [];
  let previous: Token | undefined;

  try {
    for (const token of tokenize(source)) {
      if (
        token.kind === TokenKind.STRING &&
        previous?.kind === TokenKind.IDENTIFIER &&
        previous.value === "import" &&
        !imports.includes(token.value)
      ) {
        imports.push(token.value);
      }
      previous = token;
    }
  } catch (err) {
    if (!(err instanceof LexError)) throw err;
  }

  return imports;
}
