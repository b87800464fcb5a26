import { describeToken, TokenKind, type IdentifierToken, type SourceSpan, type Token } from "../types/token.js";
import type {
  ImportDecl,
  LayoutNode,
  Property,
  SelectorPart,
  SourceFile,
  StyleRule,
  VariableBinding,
  WidgetDefinition,
} from "../types/ast.js";
import { WILDCARD } from "../types/ast.js";
import type { Value } from "../types/value.js";
import {
  booleanValue,
  dictValue,
  floatValue,
  integerValue,
  listValue,
  percentageValue,
  pixelsValue,
  stringValue,
  variableRef,
} from "../types/value.js";
import { DiagnosticCode, type Diagnostic } from "../types/diagnostic.js";
import { ParseError } from "../types/errors.js";

export interface ParseOptions {
  /**
   * Keep going after a syntax error: record it, skip to the next top-level
   * declaration and continue. Lexer errors still abort.
   */
  recover?: boolean;
}

export interface ParseResult {
  file: SourceFile;
  /** Warnings, plus every recovered error when `recover` is set. */
  diagnostics: Diagnostic[];
}

const TOP_LEVEL_KEYWORDS = ["layout", "var", "style", "import", "def"];

const EMPTY_SPAN: SourceSpan = { line: 1, column: 1, offset: 0, length: 0 };

export function parseTokens(tokens: Iterable<Token>, options: ParseOptions = {}): ParseResult {
  const iterator = tokens[Symbol.iterator]();
  let endSpan = EMPTY_SPAN;
  let depth = 0;
  let consumed = 0;

  function pull(): Token {
    const result = iterator.next();
    if (result.done === true) {
      return { kind: TokenKind.EOF, value: "", span: endSpan };
    }
    endSpan = result.value.span;
    return result.value;
  }

  let current = pull();
  let lookahead = current.kind === TokenKind.EOF ? current : pull();

  function advance(): Token {
    const tok = current;
    if (tok.kind === TokenKind.PUNCTUATION) {
      if (tok.value === "{") depth++;
      if (tok.value === "}") depth = Math.max(0, depth - 1);
    }
    current = lookahead;
    lookahead = current.kind === TokenKind.EOF ? current : pull();
    consumed++;
    return tok;
  }

  function isPunct(value: string): boolean {
    return current.kind === TokenKind.PUNCTUATION && current.value === value;
  }

  function matchPunct(value: string): boolean {
    if (isPunct(value)) {
      advance();
      return true;
    }
    return false;
  }

  function unexpected(expected: readonly string[]): ParseError {
    return new ParseError(expected, describeToken(current), current.span);
  }

  function expectPunct(value: string, expected: readonly string[] = [`'${value}'`]): Token {
    if (!isPunct(value)) {
      throw unexpected(expected);
    }
    return advance();
  }

  function expectIdentifier(what: string): IdentifierToken {
    const tok = current;
    if (tok.kind !== TokenKind.IDENTIFIER) {
      throw unexpected([what]);
    }
    advance();
    return tok;
  }

  /** An identifier directly followed by ':' is a property, whatever its text. */
  function atProperty(): boolean {
    return (
      current.kind === TokenKind.IDENTIFIER &&
      lookahead.kind === TokenKind.PUNCTUATION &&
      lookahead.value === ":"
    );
  }

  function atKeyword(...words: string[]): boolean {
    return current.kind === TokenKind.IDENTIFIER && words.includes(current.value);
  }

  const diagnostics: Diagnostic[] = [];
  const file: SourceFile = { imports: [], variables: [], styles: [], layouts: [], widgets: [] };

  while (current.kind !== TokenKind.EOF) {
    if (options.recover !== true) {
      parseDeclaration();
      continue;
    }

    const before = consumed;
    try {
      parseDeclaration();
    } catch (err) {
      if (!(err instanceof ParseError)) throw err;
      diagnostics.push(err.toDiagnostic());
      synchronize(before);
    }
  }

  return { file, diagnostics };

  function synchronize(before: number): void {
    if (consumed === before && current.kind !== TokenKind.EOF) {
      advance();
    }
    while (current.kind !== TokenKind.EOF) {
      if (depth === 0 && atKeyword(...TOP_LEVEL_KEYWORDS)) return;
      advance();
    }
  }

  function parseDeclaration(): void {
    if (atKeyword("layout")) {
      file.layouts.push(parseLayout());
      return;
    }
    if (atKeyword("var")) {
      declareVariable(file.variables, parseVariable());
      return;
    }
    if (atKeyword("style")) {
      const keyword = advance();
      parseStyle([], keyword.span);
      return;
    }
    if (atKeyword("import")) {
      file.imports.push(parseImport());
      return;
    }
    if (atKeyword("def")) {
      file.widgets.push(parseDefinition());
      return;
    }
    throw unexpected(TOP_LEVEL_KEYWORDS.map((k) => `'${k}'`));
  }

  function parseImport(): ImportDecl {
    const keyword = advance();
    const tok = current;
    if (tok.kind !== TokenKind.STRING) {
      throw unexpected(["style guide name string"]);
    }
    advance();
    expectPunct(";");
    return { path: tok.value, span: keyword.span };
  }

  function parseDefinition(): WidgetDefinition {
    const keyword = advance(); // def
    const name = expectIdentifier("widget name");
    if (file.widgets.some((w) => w.name === name.value)) {
      throw definitionError(`Widget '${name.value}' is already defined`, name.span);
    }
    expectPunct("{");

    const variables: VariableBinding[] = [];
    let layout: LayoutNode | undefined;
    while (!isPunct("}") && current.kind !== TokenKind.EOF) {
      if (atKeyword("var")) {
        declareVariable(variables, parseVariable());
      } else if (atKeyword("layout")) {
        if (layout !== undefined) {
          throw definitionError(`Widget '${name.value}' cannot have more than one layout`, current.span);
        }
        layout = parseLayout(true);
      } else {
        throw unexpected(["'var'", "'layout'", "'}'"]);
      }
    }
    expectPunct("}");

    if (layout === undefined) {
      throw definitionError(`Widget '${name.value}' has no layout`, name.span);
    }
    const outputs = countOutputs(layout);
    if (outputs === 0) {
      throw definitionError(`Layout of widget '${name.value}' has no output slot`, name.span);
    }
    if (outputs > 1) {
      throw definitionError(`Widget '${name.value}' has more than one output slot`, name.span);
    }
    return { name: name.value, variables, layout, span: keyword.span };
  }

  function definitionError(detail: string, span: SourceSpan): ParseError {
    return new ParseError(["a complete widget definition"], describeToken(current), span, {
      detail,
      code: DiagnosticCode.WIDGET_DEFINITION,
    });
  }

  function parseLayout(inDefinition = false): LayoutNode {
    const keyword = advance(); // layout | with
    const widget = expectIdentifier("widget name");
    const node: LayoutNode = {
      widget: widget.value,
      classes: [],
      properties: new Map(),
      variables: [],
      children: [],
      output: false,
      span: keyword.span,
    };

    if (matchPunct(";")) {
      return node;
    }
    expectPunct("{", ["';'", "'{'"]);

    while (!isPunct("}") && current.kind !== TokenKind.EOF) {
      if (atProperty()) {
        setProperty(node.properties, parseProperty());
      } else if (atKeyword("layout", "with")) {
        node.children.push(parseLayout(inDefinition));
      } else if (atKeyword("var")) {
        declareVariable(node.variables, parseVariable());
      } else if (inDefinition && atKeyword("output")) {
        advance();
        expectPunct(";");
        node.output = true;
      } else if (atKeyword("class")) {
        advance();
        const name = expectIdentifier("class name").value;
        expectPunct(";");
        if (!node.classes.includes(name)) {
          node.classes.push(name);
        }
      } else if (current.kind === TokenKind.IDENTIFIER) {
        throw new ParseError(["':'"], describeToken(lookahead), lookahead.span);
      } else {
        throw unexpected(["property name", "'layout'", "'with'", "'var'", "'class'", "'}'"]);
      }
    }

    expectPunct("}");
    return node;
  }

  function countOutputs(node: LayoutNode): number {
    return node.children.reduce((sum, child) => sum + countOutputs(child), node.output ? 1 : 0);
  }

  function parseProperty(): Property {
    const name = advance();
    expectPunct(":");
    const value = parseValue();
    expectPunct(";");
    return { name: name.value, value, span: name.span };
  }

  function setProperty(target: Map<string, Property>, property: Property): void {
    if (target.has(property.name)) {
      diagnostics.push({
        severity: "warning",
        code: DiagnosticCode.DUPLICATE_PROPERTY,
        message: `Property '${property.name}' is set more than once; the last value wins`,
        span: property.span,
      });
    }
    target.set(property.name, property);
  }

  function parseVariable(): VariableBinding {
    advance(); // var
    const name = expectIdentifier("variable name");
    expectPunct("=");
    const value = parseValue();
    expectPunct(";");
    return { name: name.value, value, span: name.span };
  }

  function declareVariable(scope: VariableBinding[], binding: VariableBinding): void {
    if (scope.some((b) => b.name === binding.name)) {
      throw new ParseError(["a new variable name"], `'${binding.name}'`, binding.span, {
        detail: `Variable '${binding.name}' is already declared in this block`,
        code: DiagnosticCode.DUPLICATE_VARIABLE,
      });
    }
    scope.push(binding);
  }

  function parseSelectorPart(): SelectorPart {
    let widget: string;
    if (matchPunct(WILDCARD)) {
      widget = WILDCARD;
    } else {
      widget = expectIdentifier("widget name or '*'").value;
    }

    const part: SelectorPart = { widget, whitelist: [], blacklist: [] };
    while (isPunct("+") || isPunct("!")) {
      const list = advance().value === "+" ? part.whitelist : part.blacklist;
      const name = expectIdentifier("class name").value;
      if (!list.includes(name)) {
        list.push(name);
      }
    }
    return part;
  }

  function parseStyle(parent: ReadonlyArray<SelectorPart>, span: SourceSpan): void {
    const part = parseSelectorPart();
    expectPunct("{", ["'+'", "'!'", "'{'"]);

    const rule: StyleRule = {
      selector: { hierarchy: [...parent, part] },
      properties: new Map(),
      span,
    };
    const index = file.styles.length;
    file.styles.push(rule);

    while (!isPunct("}") && current.kind !== TokenKind.EOF) {
      if (atProperty()) {
        setProperty(rule.properties, parseProperty());
      } else if (atKeyword("with")) {
        const keyword = advance();
        parseStyle(rule.selector.hierarchy, keyword.span);
      } else {
        throw unexpected(["property name", "'with'", "'}'"]);
      }
    }
    expectPunct("}");

    if (rule.properties.size === 0) {
      file.styles.splice(index, 1);
    }
  }

  function parseValue(): Value {
    const tok = current;
    switch (tok.kind) {
      case TokenKind.STRING:
        advance();
        return stringValue(tok.value);
      case TokenKind.INTEGER:
        advance();
        return integerValue(parseInt(tok.value, 10));
      case TokenKind.FLOAT:
        advance();
        return floatValue(parseFloat(tok.value));
      case TokenKind.DIMENSION: {
        advance();
        const n = parseFloat(tok.value);
        return tok.unit === "px" ? pixelsValue(n) : percentageValue(n);
      }
      case TokenKind.COLOR:
        advance();
        return { ...tok.color };
      case TokenKind.BOOLEAN:
        advance();
        return booleanValue(tok.value === "true");
      case TokenKind.IDENTIFIER:
        // Bare words are strings, e.g. `align: center;`
        advance();
        return stringValue(tok.value);
      case TokenKind.VARIABLE:
        advance();
        return variableRef(tok.value, tok.span);
      case TokenKind.PUNCTUATION:
        if (tok.value === "[") return parseList();
        if (tok.value === "{") return parseDict();
        break;
      default:
        break;
    }
    throw unexpected(["value"]);
  }

  function parseList(): Value {
    advance(); // [
    const items: Value[] = [];
    while (!isPunct("]")) {
      items.push(parseValue());
      if (!matchPunct(",")) break;
    }
    expectPunct("]", ["','", "']'"]);
    return listValue(items);
  }

  function parseDict(): Value {
    advance(); // {
    const entries = new Map<string, Value>();
    while (!isPunct("}")) {
      const key = expectIdentifier("property name");
      if (entries.has(key.value)) {
        throw new ParseError(["a unique property name"], `'${key.value}'`, key.span, {
          detail: `Duplicate property '${key.value}' in dict`,
          code: DiagnosticCode.DUPLICATE_KEY,
        });
      }
      expectPunct(":");
      entries.set(key.value, parseValue());
      if (!matchPunct(",")) break;
    }
    expectPunct("}", ["','", "'}'"]);
    return dictValue(entries);
  }
}
