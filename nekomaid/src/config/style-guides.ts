import { readFile } from "fs/promises";
import type { StyleGuide } from "../types/document.js";
import { ConfigError, NekoMaidError } from "../types/errors.js";
import { predictImports } from "../parser/imports.js";
import { loadDocument } from "../compile.js";
import { styleGuideFromDocument } from "../resolver/index.js";

export interface LoadStyleGuidesOptions {
  widgets?: Iterable<string>;
}

/**
 * Loads every configured style guide. A guide may import other configured
 * guides; those are loaded first. Import cycles and broken guides raise
 * ConfigError with the underlying error as its cause.
 */
export async function loadStyleGuides(
  paths: Readonly<Record<string, string>>,
  options: LoadStyleGuidesOptions = {},
): Promise<Map<string, StyleGuide>> {
  const sources = new Map<string, string>();
  for (const [name, path] of Object.entries(paths)) {
    try {
      sources.set(name, await readFile(path, "utf-8"));
    } catch (err) {
      throw new ConfigError(`Cannot read style guide '${name}'`, path, { cause: err });
    }
  }

  const guides = new Map<string, StyleGuide>();
  const loading: string[] = [];

  const load = (name: string): void => {
    if (guides.has(name)) return;
    const source = sources.get(name);
    // Unknown names surface as undefined-style when the importer resolves.
    if (source === undefined) return;

    if (loading.includes(name)) {
      const cycle = [...loading.slice(loading.indexOf(name)), name].join(" -> ");
      throw new ConfigError(`Style guide import cycle: ${cycle}`, paths[name]);
    }

    loading.push(name);
    try {
      for (const dependency of predictImports(source)) {
        load(dependency);
      }
      const document = loadDocument(source, { styleGuides: guides, widgets: options.widgets });
      guides.set(name, styleGuideFromDocument(name, document));
    } catch (err) {
      if (err instanceof NekoMaidError) {
        throw new ConfigError(`Style guide '${name}': ${err.message}`, paths[name], { cause: err });
      }
      throw err;
    } finally {
      loading.pop();
    }
  };

  for (const name of sources.keys()) {
    load(name);
  }
  return guides;
}
