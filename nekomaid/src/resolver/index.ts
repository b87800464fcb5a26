export { resolve, styleGuideFromDocument } from "./resolve.js";
export type { ResolveOptions } from "./resolve.js";
export { Scope } from "./scope.js";
export { ResolutionError } from "../types/errors.js";
