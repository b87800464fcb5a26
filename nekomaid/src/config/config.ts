import { readFile } from "fs/promises";
import { dirname, resolve } from "path";
import AjvModule from "ajv";
import { ConfigError } from "../types/errors.js";
import { CONFIG_SCHEMA, type ConfigFile } from "./schema.js";

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile<ConfigFile>(CONFIG_SCHEMA);

export const CONFIG_FILE_NAME = "nekomaid.config.json";

export interface NekoMaidConfig {
  recover: boolean;
  /** Known widget names; undefined accepts any widget. */
  widgets: string[] | undefined;
  /** Style guide name to absolute file path. */
  styleGuides: Record<string, string>;
  debounceMs: number;
  /** The file the config was read from, if one was found. */
  path: string | undefined;
}

export const DEFAULT_CONFIG: Readonly<NekoMaidConfig> = Object.freeze({
  recover: false,
  widgets: undefined,
  styleGuides: {},
  debounceMs: 100,
  path: undefined,
});

export type ConfigEnv = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  /** Defaults to `process.env`. */
  env?: ConfigEnv;
  /** Directory searched when no path is given, and base for a relative path. */
  cwd?: string;
}

/**
 * Reads and validates a config file, then applies environment overrides.
 * Without a path, `nekomaid.config.json` in the working directory is tried and
 * defaults are used when it is absent. An explicit path must exist.
 */
export async function loadConfig(path?: string, options: LoadConfigOptions = {}): Promise<NekoMaidConfig> {
  const cwd = options.cwd ?? process.cwd();
  const file = resolve(cwd, path ?? CONFIG_FILE_NAME);

  let content: string | undefined;
  try {
    content = await readFile(file, "utf-8");
  } catch (err) {
    if (!isNotFound(err)) {
      throw new ConfigError("Cannot read config file", file, { cause: err });
    }
    if (path !== undefined) {
      throw new ConfigError("Config file not found", file, { cause: err });
    }
  }

  const config = content === undefined ? { ...DEFAULT_CONFIG } : parseConfig(content, file);
  return applyEnv(config, options.env ?? process.env);
}

/** Validates config text; style guide paths become absolute, relative to `file`. */
export function parseConfig(content: string, file: string): NekoMaidConfig {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid JSON: ${reason}`, file, { cause: err });
  }

  if (!validateConfigFile(data)) {
    throw new ConfigError(ajv.errorsText(validateConfigFile.errors, { dataVar: "config" }), file);
  }

  const baseDir = dirname(file);
  const styleGuides: Record<string, string> = {};
  for (const [name, guidePath] of Object.entries(data.styleGuides ?? {})) {
    styleGuides[name] = resolve(baseDir, guidePath);
  }

  return {
    recover: data.recover ?? DEFAULT_CONFIG.recover,
    widgets: data.widgets !== undefined ? [...data.widgets] : undefined,
    styleGuides,
    debounceMs: data.debounceMs ?? DEFAULT_CONFIG.debounceMs,
    path: file,
  };
}

/** NEKOMAID_RECOVER and NEKOMAID_DEBOUNCE_MS win over the file. */
export function applyEnv(config: NekoMaidConfig, env: ConfigEnv): NekoMaidConfig {
  const result = { ...config };

  const recover = env.NEKOMAID_RECOVER;
  if (recover !== undefined && recover !== "") {
    if (recover === "1" || recover === "true") {
      result.recover = true;
    } else if (recover === "0" || recover === "false") {
      result.recover = false;
    } else {
      throw new ConfigError(`NEKOMAID_RECOVER must be one of 1, 0, true, false; got '${recover}'`);
    }
  }

  const debounce = env.NEKOMAID_DEBOUNCE_MS;
  if (debounce !== undefined && debounce !== "") {
    if (!/^\d+$/.test(debounce)) {
      throw new ConfigError(`NEKOMAID_DEBOUNCE_MS must be a non-negative integer; got '${debounce}'`);
    }
    result.debounceMs = Number.parseInt(debounce, 10);
  }

  return result;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
