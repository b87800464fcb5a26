export * from "./types/index.js";
export { parseSource, parseTokens, predictImports, tokenize, tokenizeAll } from "./parser/index.js";
export type { ParseOptions, ParseResult } from "./parser/index.js";
export { cascade, formatSelector, partMatches, selectorMatches } from "./stylesheet/index.js";
export type { PathEntry } from "./stylesheet/index.js";
export { Scope, resolve, styleGuideFromDocument } from "./resolver/index.js";
export type { ResolveOptions } from "./resolver/index.js";
export { compile, loadDocument } from "./compile.js";
export type { CompileOptions, CompileResult } from "./compile.js";
export { deepFreeze } from "./document/freeze.js";
export { documentToJSON, valueToJSON } from "./document/json.js";
export type { JsonValue } from "./document/json.js";
export { documentsEqual, nodesEqual } from "./document/equal.js";
export { DocumentEventEmitter } from "./events/emitter.js";
export type { DocumentListener, EventStreamOptions } from "./events/emitter.js";
export { DocumentStore } from "./reload/store.js";
export type { DocumentStoreOptions, ReloadResult } from "./reload/store.js";
export * from "./config/index.js";
