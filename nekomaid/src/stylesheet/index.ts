export { cascade } from "./cascade.js";
export { formatSelector, partMatches, selectorMatches } from "./selector.js";
export type { PathEntry } from "./selector.js";
