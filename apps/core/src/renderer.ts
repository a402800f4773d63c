import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ContextAccess } from "./context.js";
import { bundledDefaultsDir, promptsDir } from "./paths.js";
import { interpolate } from "./utils.js";

/** Turns a stage's prompt handle and the current context into prompt text. */
export interface PromptRenderer {
  render(promptRef: string, ctx: ContextAccess): Promise<string>;
}

const TEMPLATE_EXT = ".md";

/**
 * Resolves `<ref>.md` handles against the repo's `.stageloop/prompts/<kind>/`,
 * then the bundled prompts. Any other handle is treated as an inline template.
 * Placeholders use `{key}` syntax.
 */
export class TemplateRenderer implements PromptRenderer {
  private readonly templateCache = new Map<string, string>();

  constructor(
    private readonly repoRoot: string,
    private readonly pipelineKind: string,
  ) {}

  async render(promptRef: string, ctx: ContextAccess): Promise<string> {
    const template = promptRef.endsWith(TEMPLATE_EXT) ? await this.loadTemplate(promptRef) : promptRef;
    return interpolate(template, (key) => ctx.get(key));
  }

  private async loadTemplate(ref: string): Promise<string> {
    const cached = this.templateCache.get(ref);
    if (cached !== undefined) return cached;

    const candidates = path.isAbsolute(ref)
      ? [ref]
      : [
          path.join(promptsDir(this.repoRoot, this.pipelineKind), ref),
          path.join(this.repoRoot, ref),
          path.join(bundledDefaultsDir(), "prompts", this.pipelineKind, ref),
        ];

    for (const candidate of candidates) {
      try {
        const content = await fs.readFile(candidate, "utf-8");
        this.templateCache.set(ref, content);
        return content;
      } catch {
        continue;
      }
    }
    throw new Error(`Prompt template "${ref}" not found (looked in ${candidates.join(", ")})`);
  }
}
