export const CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    recover: { type: "boolean" },
    widgets: {
      type: "array",
      items: { type: "string", pattern: "^[A-Za-z_][A-Za-z0-9_-]*$" },
      uniqueItems: true,
    },
    styleGuides: {
      type: "object",
      additionalProperties: { type: "string", minLength: 1 },
    },
    debounceMs: { type: "integer", minimum: 0 },
  },
} as const;

/** The config file as written on disk; every field is optional. */
export interface ConfigFile {
  recover?: boolean;
  widgets?: string[];
  styleGuides?: Record<string, string>;
  debounceMs?: number;
}
