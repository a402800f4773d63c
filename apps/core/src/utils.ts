import type { JsonObject, JsonValue } from "./pipeline-types.js";

/** Narrow a parsed JSON value to a plain object (not an array, not null). */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Render a context value for prompt or path substitution. */
export function stringifyValue(value: JsonValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Replace `{key}` placeholders with values from `lookup`.
 * Unknown keys are left in place so literal braces in prompts survive.
 */
export function interpolate(template: string, lookup: (key: string) => JsonValue | undefined): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (match, key: string) => {
    const value = lookup(key);
    return value === undefined ? match : stringifyValue(value);
  });
}

/** Format a millisecond duration as `1m 05s` / `42s`. */
export function formatDuration(ms: number): string {
  const sec = Math.floor(ms / 1000);
  if (sec < 60) return `${sec}s`;
  const m = Math.floor(sec / 60);
  const s = sec % 60;
  if (m < 60) return `${m}m ${String(s).padStart(2, "0")}s`;
  const h = Math.floor(m / 60);
  return `${h}h ${String(m % 60).padStart(2, "0")}m`;
}

/** Markdown bullet list of paths, or "None". */
export function formatFileList(files: readonly string[]): string {
  if (files.length === 0) return "None";
  return files.map((f) => `- \`${f}\``).join("\n");
}
