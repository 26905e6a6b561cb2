/**
 * Placeholder Renderer
 *
 * Renders a template's project/ directory into a temporary directory,
 * substituting {{ variable }} placeholders in paths and file contents
 */

import { isUtf8 } from "node:buffer";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { ContextStore } from "./ContextStore.js";
import { resolveInside } from "./paths.js";
import { TemplateDiscovery } from "./TemplateDiscovery.js";
import { TemplateVariableResolver } from "./TemplateVariableResolver.js";
import type { TemplateContext } from "./types.js";

/**
 * Ask for a variable's value, offering its default
 */
export type Prompt = (name: string, defaultValue: string) => Promise<string>;

export interface RenderRequest {
  templateDir: string;
  /** Declared variables and their defaults */
  variables: Record<string, string>;
  /** Context recorded by a previous rollup, null for a new project */
  persistedContext: TemplateContext | null;
  extraContext: TemplateContext;
  contextStore: ContextStore;
  /** Absent when running without input */
  prompt?: Prompt;
}

export interface RenderResult {
  outputDir: string;
  context: TemplateContext;
  /** Remove the rendered tree */
  cleanup(): Promise<void>;
}

export interface TemplateRenderer {
  render(request: RenderRequest): Promise<RenderResult>;
}

/**
 * Every persisted and extra key, plus a value for each declared variable:
 * extra context first, then the persisted one, then a prompt, then the default
 */
export async function resolveContext(request: RenderRequest): Promise<TemplateContext> {
  const persisted = request.persistedContext ?? {};
  const context: TemplateContext = { ...persisted, ...request.extraContext };

  for (const [name, defaultValue] of Object.entries(request.variables)) {
    if (Object.prototype.hasOwnProperty.call(request.extraContext, name)) {
      continue;
    }
    if (Object.prototype.hasOwnProperty.call(persisted, name)) {
      continue;
    }
    context[name] = request.prompt ? await request.prompt(name, defaultValue) : defaultValue;
  }

  return context;
}

export class PlaceholderRenderer implements TemplateRenderer {
  async render(request: RenderRequest): Promise<RenderResult> {
    const context = await resolveContext(request);
    const outputDir = await fs.mkdtemp(path.join(os.tmpdir(), "template-rollup-"));
    const cleanup = () => fs.rm(outputDir, { recursive: true, force: true });

    try {
      const discovery = TemplateDiscovery.forTemplate(request.templateDir);
      const rendered = new Set<string>();

      for (const relativePath of await discovery.discoverFiles()) {
        const outputPath = TemplateVariableResolver.resolve(relativePath, context, relativePath);
        await this.renderFile(
          discovery.resolve(relativePath),
          resolveInside(outputDir, outputPath),
          context,
          relativePath,
        );
        rendered.add(outputPath);
      }

      const { contextStore } = request;
      if (contextStore.writtenByRenderer && !rendered.has(contextStore.fileName)) {
        await fs.writeFile(
          path.join(outputDir, contextStore.fileName),
          contextStore.serialize(context),
          "utf-8",
        );
      }
    } catch (error: unknown) {
      await cleanup();
      throw error;
    }

    return { outputDir, context, cleanup };
  }

  private async renderFile(
    sourcePath: string,
    outputPath: string,
    context: TemplateContext,
    relativePath: string,
  ): Promise<void> {
    const [contents, stats] = await Promise.all([fs.readFile(sourcePath), fs.stat(sourcePath)]);

    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    if (isUtf8(contents)) {
      const text = TemplateVariableResolver.resolve(contents.toString("utf-8"), context, relativePath);
      await fs.writeFile(outputPath, text, "utf-8");
    } else {
      // Binary files are copied untouched
      await fs.writeFile(outputPath, contents);
    }
    await fs.chmod(outputPath, stats.mode & 0o777);
  }
}
