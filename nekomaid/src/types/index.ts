export * from "./token.js";
export * from "./value.js";
export * from "./ast.js";
export * from "./document.js";
export * from "./diagnostic.js";
export * from "./errors.js";
export * from "./events.js";
