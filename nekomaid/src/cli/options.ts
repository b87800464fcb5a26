import type { CompileOptions } from "../compile.js";
import type { StyleGuide } from "../types/document.js";
import { loadConfig, loadStyleGuides, type NekoMaidConfig } from "../config/index.js";

export interface PreparedOptions {
  config: NekoMaidConfig;
  compile: CompileOptions;
}

/** Loads the config and its style guides; `recover` from the command line wins. */
export async function prepareOptions(configPath: string | undefined, recover?: boolean): Promise<PreparedOptions> {
  const config = await loadConfig(configPath);
  const styleGuides: Map<string, StyleGuide> = await loadStyleGuides(config.styleGuides, { widgets: config.widgets });
  return {
    config,
    compile: {
      recover: recover ?? config.recover,
      widgets: config.widgets,
      styleGuides,
    },
  };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
