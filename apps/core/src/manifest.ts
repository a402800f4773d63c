import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import type { ContextAccess } from "./context.js";
import { ManifestError } from "./errors.js";
import type { JsonObject, JsonValue, ManifestSpec } from "./pipeline-types.js";
import { isJsonObject } from "./utils.js";

const FENCE = "---";

/** Header keys whose values are file paths, resolved against the manifest's directory on load. */
const PATH_FIELDS = ["tasks", "context", "plan"] as const;

/**
 * Hand-off document a terminal stage leaves for downstream tooling:
 * a YAML key/value header followed by a free-form markdown body.
 */
export interface ManifestDocument {
  /** Pipeline kind the manifest targets. */
  readonly pipeline: string;
  /** Every header entry, `pipeline` included. */
  readonly header: JsonObject;
  readonly body: string;
}

/** Assemble a manifest from a pipeline's manifest settings and the final context. */
export function buildManifest(spec: ManifestSpec, source: string, ctx: ContextAccess): ManifestDocument {
  const header: JsonObject = { pipeline: spec.target, source };
  for (const [flag, value] of Object.entries(spec.flags)) header[flag] = value;
  for (const [key, contextKey] of Object.entries(spec.fields)) {
    const value = ctx.get(contextKey);
    if (value !== undefined && value !== "") header[key] = value;
  }
  const body = spec.body ? (ctx.getString(spec.body) ?? "") : "";
  return { pipeline: spec.target, header, body };
}

export function renderManifest(doc: ManifestDocument): string {
  const header: JsonObject = { ...doc.header, pipeline: doc.pipeline };
  const body = doc.body.trim();
  return `${FENCE}\n${stringifyYaml(header)}${FENCE}\n${body ? `\n${body}\n` : ""}`;
}

function resolvePath(value: JsonValue, baseDir: string): JsonValue {
  if (typeof value === "string") return value === "" ? value : path.resolve(baseDir, value);
  if (Array.isArray(value)) return value.map((item) => resolvePath(item, baseDir));
  return value;
}

/** Parse manifest text. Relative path fields are resolved against `baseDir`. */
export function parseManifest(text: string, baseDir: string, filePath = "<inline>"): ManifestDocument {
  const normalized = text.replace(/\r\n/g, "\n");
  if (!normalized.startsWith(`${FENCE}\n`)) throw new ManifestError(filePath, "missing front-matter header");
  const close = normalized.indexOf(`\n${FENCE}`, FENCE.length);
  if (close === -1) throw new ManifestError(filePath, "unterminated front-matter header");

  let parsed: unknown;
  try {
    parsed = parseYaml(normalized.slice(FENCE.length + 1, close + 1));
  } catch (err) {
    throw new ManifestError(filePath, err instanceof Error ? err.message : String(err));
  }
  if (!isJsonObject(parsed)) throw new ManifestError(filePath, "header must be a key/value block");
  const pipeline = parsed.pipeline;
  if (typeof pipeline !== "string" || pipeline === "") {
    throw new ManifestError(filePath, 'header must declare "pipeline"');
  }

  const header: JsonObject = { ...parsed };
  for (const key of PATH_FIELDS) {
    if (key in header) header[key] = resolvePath(header[key], baseDir);
  }

  const rest = normalized.slice(close + FENCE.length + 1);
  return { pipeline, header, body: rest.replace(/^\n+/, "").trimEnd() };
}

export async function writeManifest(filePath: string, doc: ManifestDocument): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, renderManifest(doc));
}

export async function loadManifest(filePath: string): Promise<ManifestDocument> {
  const text = await fs.readFile(filePath, "utf-8");
  return parseManifest(text, path.dirname(path.resolve(filePath)), filePath);
}
